import { PairSnapshot } from '../types/dexscreener';
import { CandidateVerdict, FilterConfig } from '../types/filter';

const MS_PER_MINUTE = 60_000;

/**
 * Runs the five checks in order and stops at the first failure. Never throws.
 */
export function evaluateCandidate(
  pair: PairSnapshot,
  alreadyAlerted: ReadonlySet<string>,
  now: number,
  config: FilterConfig
): CandidateVerdict {
  if (pair.chainId !== config.targetNetwork) {
    return { selected: false, reason: 'wrong_network' };
  }

  if (pair.createdAt === null || pair.createdAt === 0) {
    return { selected: false, reason: 'missing_created_at' };
  }

  // A pair "from the future" means the source clock is off; its timestamps are not trusted.
  const ageMinutes = (now - pair.createdAt) / MS_PER_MINUTE;
  if (ageMinutes < 0) {
    return { selected: false, reason: 'negative_age' };
  }
  if (ageMinutes > config.maxAgeMinutes) {
    return { selected: false, reason: 'too_old' };
  }

  if (!(pair.volume24h > config.minVolumeUsd)) {
    return { selected: false, reason: 'low_volume' };
  }

  if (alreadyAlerted.has(pair.identifier)) {
    return { selected: false, reason: 'already_alerted' };
  }

  return { selected: true, ageMinutes };
}

/**
 * Pairs that deserve an alert now, in source order, at most one per identifier
 * (the first qualifying occurrence wins).
 */
export function selectCandidates(
  snapshots: readonly PairSnapshot[],
  alreadyAlerted: ReadonlySet<string>,
  now: number,
  config: FilterConfig
): PairSnapshot[] {
  const selected: PairSnapshot[] = [];
  const seen = new Set<string>();

  for (const pair of snapshots) {
    if (seen.has(pair.identifier)) continue;

    const verdict = evaluateCandidate(pair, alreadyAlerted, now, config);
    if (verdict.selected) {
      selected.push(pair);
      seen.add(pair.identifier);
    }
  }

  return selected;
}

export function summarizeRejections(
  snapshots: readonly PairSnapshot[],
  alreadyAlerted: ReadonlySet<string>,
  now: number,
  config: FilterConfig
): Record<string, number> {
  const counts: Record<string, number> = {};
  for (const pair of snapshots) {
    const verdict = evaluateCandidate(pair, alreadyAlerted, now, config);
    if (!verdict.selected) {
      counts[verdict.reason] = (counts[verdict.reason] ?? 0) + 1;
    }
  }
  return counts;
}
