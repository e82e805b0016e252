import { z } from "zod";
import { BotConfig } from "../config/config.js";
import { SecuritySource } from "../core/collaborators.js";
import { SecurityProfile } from "../core/types.js";
import { FetchLike } from "../rpc/dexScreenerClient.js";
import { logger } from "../utils/logger.js";
import { retryWithBackoff, sleep } from "../utils/sleep.js";

const EVM_CHAIN_IDS: Record<string, string> = {
  ethereum: "1",
  bsc: "56",
  polygon: "137",
  arbitrum: "42161",
  base: "8453"
};

const flag = z.coerce.string().catch("0");
const numeric = z.coerce.number().catch(0);

const evmTokenSchema = z.object({
  is_honeypot: flag,
  buy_tax: numeric,
  sell_tax: numeric,
  is_mintable: flag,
  is_blacklisted: flag,
  is_open_source: flag,
  owner_address: z.string().optional(),
  can_take_back_ownership: flag,
  holder_count: numeric,
  holders: z.array(z.object({ address: z.string(), percent: numeric })).catch([])
});

const solanaTokenSchema = z.object({
  non_transferable: flag,
  mintable: z.object({ status: flag }).catch({ status: "0" }),
  freezable: z.object({ status: flag }).catch({ status: "0" }),
  holder_count: numeric,
  holders: z
    .array(z.object({ account: z.string().optional(), address: z.string().optional(), percent: numeric }))
    .catch([])
});

const responseSchema = z.object({
  code: z.number(),
  message: z.string().optional(),
  result: z.record(z.unknown()).nullable().optional()
});

export type RawSecurity =
  | { kind: "evm"; data: z.infer<typeof evmTokenSchema> }
  | { kind: "solana"; data: z.infer<typeof solanaTokenSchema> };

const isSet = (value: string) => value === "1";

/** Collapses either chain family's GoPlus payload into one profile shape. Percentages come back as fractions. */
export const normalizeSecurity = (raw: RawSecurity): SecurityProfile => {
  switch (raw.kind) {
    case "solana": {
      const data = raw.data;
      return {
        isHoneypot: isSet(data.non_transferable),
        isMintable: isSet(data.mintable.status),
        isBlacklisted: isSet(data.freezable.status),
        // SPL tokens have no source verification
        isOpenSource: true,
        buyTaxPct: 0,
        sellTaxPct: 0,
        holderCount: data.holder_count,
        holders: data.holders.map((holder) => ({
          address: holder.account ?? holder.address ?? "",
          percent: holder.percent * 100
        })),
        ownerAddress: null,
        canTakeBackOwnership: false
      };
    }
    case "evm": {
      const data = raw.data;
      return {
        isHoneypot: isSet(data.is_honeypot),
        isMintable: isSet(data.is_mintable),
        isBlacklisted: isSet(data.is_blacklisted),
        isOpenSource: isSet(data.is_open_source),
        buyTaxPct: data.buy_tax * 100,
        sellTaxPct: data.sell_tax * 100,
        holderCount: data.holder_count,
        holders: data.holders.map((holder) => ({ address: holder.address, percent: holder.percent * 100 })),
        ownerAddress: data.owner_address ? data.owner_address : null,
        canTakeBackOwnership: isSet(data.can_take_back_ownership)
      };
    }
  }
};

export class SecurityEngine implements SecuritySource {
  private readonly config: BotConfig["security"];
  private readonly fetchImpl: FetchLike;
  private readonly wait: (ms: number) => Promise<void>;

  constructor(
    config: BotConfig["security"],
    fetchImpl: FetchLike = fetch,
    wait: (ms: number) => Promise<void> = sleep
  ) {
    this.config = config;
    this.fetchImpl = fetchImpl;
    this.wait = wait;
  }

  async check(tokenAddress: string, chainId: string): Promise<SecurityProfile | null> {
    try {
      const raw = await retryWithBackoff(
        () => this.fetchRaw(tokenAddress, chainId),
        { maxAttempts: this.config.maxAttempts, baseDelayMs: this.config.retryDelayMs },
        this.wait
      );
      if (!raw) {
        logger.warn({ tokenAddress, chainId }, "Security data unavailable after retries");
        return null;
      }
      return normalizeSecurity(raw);
    } catch (err) {
      logger.error({ err, tokenAddress, chainId }, "Security lookup failed");
      return null;
    }
  }

  /** Resolves null while GoPlus has not indexed the token yet. */
  private async fetchRaw(tokenAddress: string, chainId: string): Promise<RawSecurity | null> {
    const solana = chainId.toLowerCase() === "solana";
    const evmChain = EVM_CHAIN_IDS[chainId.toLowerCase()] ?? chainId;
    const url = solana
      ? `${this.config.baseUrl}/solana/token_security?contract_addresses=${encodeURIComponent(tokenAddress)}`
      : `${this.config.baseUrl}/token_security/${evmChain}?contract_addresses=${encodeURIComponent(tokenAddress)}`;

    const headers: Record<string, string> = { accept: "application/json" };
    if (this.config.apiKey) {
      headers.authorization = this.config.apiKey;
    }
    const response = await this.fetchImpl(url, { headers });
    if (!response.ok) {
      throw new Error(`GoPlus error ${response.status}`);
    }
    const body = responseSchema.parse(await response.json());
    if (body.code !== 1 || !body.result) {
      return null;
    }
    const entry = body.result[tokenAddress.toLowerCase()] ?? body.result[tokenAddress];
    if (entry === undefined || entry === null) {
      return null;
    }
    return solana
      ? { kind: "solana", data: solanaTokenSchema.parse(entry) }
      : { kind: "evm", data: evmTokenSchema.parse(entry) };
  }
}
