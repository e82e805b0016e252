import { BotConfig } from "../config/config.js";
import { CandidateSource } from "../core/collaborators.js";
import { Candidate } from "../core/types.js";
import { DexScreenerClient } from "../rpc/dexScreenerClient.js";
import { toCandidate } from "../trading/candidateBuilder.js";

/**
 * Polls DexScreener search for the configured chain and keeps pairs whose age
 * falls inside the launch window.
 */
export class NewPairsFeed implements CandidateSource {
  private readonly config: BotConfig["discovery"];
  private readonly client: DexScreenerClient;
  private readonly clock: () => number;

  constructor(config: BotConfig["discovery"], client: DexScreenerClient, clock: () => number = Date.now) {
    this.config = config;
    this.client = client;
    this.clock = clock;
  }

  async fetchCandidates(): Promise<Candidate[]> {
    const pairs = await this.client.searchPairs(this.config.searchQuery);
    const now = this.clock();
    const candidates: Candidate[] = [];
    for (const pair of pairs) {
      if (pair.chainId !== this.config.chainId) {
        continue;
      }
      const candidate = toCandidate(pair, now);
      if (!candidate) {
        continue;
      }
      if (candidate.ageMinutes < this.config.minPairAgeMinutes || candidate.ageMinutes > this.config.maxPairAgeMinutes) {
        continue;
      }
      candidates.push(candidate);
    }
    return candidates;
  }
}
