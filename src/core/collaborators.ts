import { Candidate, GradingDecision, ObservationSummary, SecurityProfile } from "./types.js";

export interface CandidateSource {
  fetchCandidates(): Promise<Candidate[]>;
}

export interface PriceSource {
  /** Latest USD price, or null when it could not be fetched. */
  getPrice(pairAddress: string, chainId: string): Promise<number | null>;
}

export interface SecuritySource {
  /** Normalized profile, or null once retries are exhausted. */
  check(tokenAddress: string, chainId: string): Promise<SecurityProfile | null>;
}

export interface ObservationSource {
  observe(pairAddress: string, chainId: string): Promise<ObservationSummary | null>;
}

export interface GradingRequest {
  candidate: Candidate;
  security: SecurityProfile;
  observation: ObservationSummary;
  score: number;
}

export interface GradingSource {
  /** Never rejects: failures resolve to a fallback decision. */
  grade(request: GradingRequest): Promise<GradingDecision>;
}

export interface Notifier {
  send(message: string): Promise<void>;
}
