// Raw shapes as returned by /latest/dex/search. Nothing here is trusted: every field is
// optional and normalizePair() decides what survives.
export interface DexScreenerPair {
  chainId?: string;
  dexId?: string;
  url?: string;
  pairAddress?: string;
  baseToken?: {
    address?: string;
    name?: string;
    symbol?: string;
  };
  quoteToken?: {
    address?: string;
    name?: string;
    symbol?: string;
  };
  priceUsd?: string;
  volume?: {
    h24?: number | string;
    h6?: number | string;
    h1?: number | string;
    m5?: number | string;
  };
  liquidity?: {
    usd?: number;
  };
  pairCreatedAt?: number | null;
}

/** One pair as the detect-and-dedup loop sees it, rebuilt from scratch every cycle. */
export interface PairSnapshot {
  /** Base token display name. Not unique over time; see DESIGN.md. */
  identifier: string;
  chainId: string;
  volume24h: number;
  /** Epoch milliseconds, or null when the source left it out or sent zero. */
  createdAt: number | null;
  url: string | null;
}
