export const DEFAULT_MAX_AGE_MINUTES = 60;
export const DEFAULT_MIN_VOLUME_USD = 500_000;

export interface FilterConfig {
  /** Chain id a pair must carry, e.g. `solana`. */
  targetNetwork: string;
  /** Inclusive upper bound on pair age. */
  maxAgeMinutes: number;
  /** Exclusive lower bound on 24h volume. */
  minVolumeUsd: number;
}

export type RejectionReason =
  | 'wrong_network'
  | 'missing_created_at'
  | 'negative_age'
  | 'too_old'
  | 'low_volume'
  | 'already_alerted';

export type CandidateVerdict =
  | { selected: true; ageMinutes: number }
  | { selected: false; reason: RejectionReason };
