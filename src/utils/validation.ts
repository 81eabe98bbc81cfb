import { PairSnapshot } from '../types/dexscreener';
import { Result, ok, err } from './result';

export interface ParsedSearch {
  snapshots: PairSnapshot[];
  /** Items dropped because they carried no chain id or no base token name. */
  dropped: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readString(value: unknown): string | null {
  if (typeof value !== 'string') return null;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
}

/** Numbers and numeric strings are accepted; anything else, NaN or negative reads as 0. */
export function toVolume(value: unknown): number {
  const parsed = typeof value === 'string' ? Number(value) : value;
  if (typeof parsed !== 'number' || !Number.isFinite(parsed) || parsed < 0) {
    return 0;
  }
  return parsed;
}

export function toCreatedAt(value: unknown): number | null {
  if (typeof value !== 'number' || !Number.isFinite(value) || value === 0) {
    return null;
  }
  return value;
}

export function normalizePair(raw: unknown): PairSnapshot | null {
  if (!isRecord(raw)) return null;

  const chainId = readString(raw.chainId);
  const baseToken = isRecord(raw.baseToken) ? raw.baseToken : {};
  const identifier = readString(baseToken.name);
  if (!chainId || !identifier) {
    return null;
  }

  const volume = isRecord(raw.volume) ? raw.volume : {};

  return {
    identifier,
    chainId: chainId.toLowerCase(),
    volume24h: toVolume(volume.h24),
    createdAt: toCreatedAt(raw.pairCreatedAt),
    url: readString(raw.url)
  };
}

export function parseSearchResponse(body: unknown): Result<ParsedSearch, string> {
  if (!isRecord(body)) {
    return err(`Expected a JSON object, got ${Array.isArray(body) ? 'array' : typeof body}`);
  }

  const pairs = body.pairs;
  if (pairs === undefined || pairs === null) {
    return ok({ snapshots: [], dropped: 0 });
  }
  if (!Array.isArray(pairs)) {
    return err(`Expected "pairs" to be an array, got ${typeof pairs}`);
  }

  const snapshots: PairSnapshot[] = [];
  let dropped = 0;
  for (const item of pairs) {
    const snapshot = normalizePair(item);
    if (snapshot) {
      snapshots.push(snapshot);
    } else {
      dropped++;
    }
  }

  return ok({ snapshots, dropped });
}
