import axios, { AxiosInstance, isAxiosError } from 'axios';
import { PairSnapshot } from '../types/dexscreener';
import { FetchError, createErrorContext, describeError } from '../utils/errorHandler';
import { Result, ok, err } from '../utils/result';
import { parseSearchResponse } from '../utils/validation';
import { logger } from '../utils/logger';

export interface PairSource {
  fetchPairs(): Promise<Result<PairSnapshot[], FetchError>>;
}

export interface DexScreenerOptions {
  baseURL?: string;
  query: string;
  timeoutMs?: number;
  /** Pre-built client; tests pass one with a custom adapter. */
  client?: AxiosInstance;
}

export class DexScreenerService implements PairSource {
  private readonly client: AxiosInstance;
  private readonly query: string;

  constructor(options: DexScreenerOptions) {
    this.query = options.query;
    this.client = options.client ?? axios.create({
      baseURL: options.baseURL ?? 'https://api.dexscreener.com',
      timeout: options.timeoutMs ?? 10000,
      headers: {
        'Accept': 'application/json',
        'User-Agent': 'new-pair-scout/1.0.0'
      }
    });

    this.client.interceptors.response.use(
      (response) => response,
      (error: unknown) => {
        if (isAxiosError(error) && error.response?.status === 429) {
          logger.warn('DexScreener rate limit hit, waiting for next cycle');
        } else if (isAxiosError(error)) {
          logger.debug('DexScreener API error', {
            status: error.response?.status,
            code: error.code,
            message: error.message
          });
        }
        return Promise.reject(error);
      }
    );
  }

  async fetchPairs(): Promise<Result<PairSnapshot[], FetchError>> {
    const context = createErrorContext('dexscreener_search', { query: this.query });

    let body: unknown;
    try {
      const response = await this.client.get<unknown>('/latest/dex/search', {
        params: { q: this.query }
      });
      body = response.data;
    } catch (error) {
      const status = isAxiosError(error) ? error.response?.status : undefined;
      const reason = status !== undefined ? `HTTP ${status}` : describeError(error);
      return err(new FetchError(`DexScreener search failed: ${reason}`, context, status, error));
    }

    const parsed = parseSearchResponse(body);
    if (!parsed.ok) {
      return err(new FetchError(`DexScreener returned an unusable body: ${parsed.error}`, context));
    }

    if (parsed.value.dropped > 0) {
      logger.debug(`Dropped ${parsed.value.dropped} pairs without chain id or token name`);
    }
    logger.debug(`DexScreener returned ${parsed.value.snapshots.length} usable pairs for "${this.query}"`);

    return ok(parsed.value.snapshots);
  }
}
