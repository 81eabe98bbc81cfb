import axios, { AxiosError, AxiosResponse, InternalAxiosRequestConfig } from 'axios';
import { DexScreenerService } from '../services/dexscreener';
import { DexScreenerPair } from '../types/dexscreener';
import { FetchError } from '../utils/errorHandler';

function respond(config: InternalAxiosRequestConfig, data: unknown, status = 200): AxiosResponse {
  return { data, status, statusText: status === 200 ? 'OK' : 'Error', headers: {}, config };
}

function serviceReturning(handler: (config: InternalAxiosRequestConfig) => Promise<AxiosResponse>): DexScreenerService {
  const client = axios.create({ baseURL: 'http://dexscreener.test', adapter: handler });
  return new DexScreenerService({ query: 'solana', client });
}

const rawPair: DexScreenerPair = {
  chainId: 'solana',
  dexId: 'raydium',
  url: 'https://dexscreener.com/solana/pair1',
  pairAddress: 'pair1',
  baseToken: { address: 'mint1', name: 'Moon Coin', symbol: 'MOON' },
  volume: { h24: 612345.5, h1: 1000 },
  pairCreatedAt: 1_700_000_000_000
};

describe('DexScreenerService', () => {
  it('should query the search endpoint and normalize pairs', async () => {
    let requested: InternalAxiosRequestConfig | undefined;
    const service = serviceReturning(async (config) => {
      requested = config;
      return respond(config, { schemaVersion: '1.0.0', pairs: [rawPair] });
    });

    const result = await service.fetchPairs();

    expect(requested?.url).toBe('/latest/dex/search');
    expect(requested?.params).toEqual({ q: 'solana' });
    expect(result.ok && result.value).toEqual([
      {
        identifier: 'Moon Coin',
        chainId: 'solana',
        volume24h: 612345.5,
        createdAt: 1_700_000_000_000,
        url: 'https://dexscreener.com/solana/pair1'
      }
    ]);
  });

  it('should tolerate missing optional fields', async () => {
    const service = serviceReturning(async (config) => respond(config, {
      pairs: [
        { chainId: 'solana', baseToken: { name: 'Bare Coin' } },
        { chainId: 'solana', baseToken: { name: 'Stringy' }, volume: { h24: '750000' }, pairCreatedAt: 0 },
        { chainId: 'solana' },
        { baseToken: { name: 'No Chain' } },
        'garbage'
      ]
    }));

    const result = await service.fetchPairs();

    expect(result.ok && result.value).toEqual([
      { identifier: 'Bare Coin', chainId: 'solana', volume24h: 0, createdAt: null, url: null },
      { identifier: 'Stringy', chainId: 'solana', volume24h: 750000, createdAt: null, url: null }
    ]);
  });

  it('should treat a null pairs field as an empty snapshot', async () => {
    const service = serviceReturning(async (config) => respond(config, { schemaVersion: '1.0.0', pairs: null }));
    const result = await service.fetchPairs();
    expect(result.ok && result.value).toEqual([]);
  });

  it('should report a network failure as a FetchError', async () => {
    const service = serviceReturning(async (config) => {
      throw new AxiosError('connect ECONNREFUSED 127.0.0.1:443', 'ECONNREFUSED', config);
    });

    const result = await service.fetchPairs();

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(FetchError);
      expect(result.error.message).toBe('DexScreener search failed: connect ECONNREFUSED 127.0.0.1:443');
      expect(result.error.status).toBeUndefined();
    }
  });

  it('should report an HTTP error status as a FetchError with the status', async () => {
    const service = serviceReturning(async (config) => {
      throw new AxiosError('Request failed with status code 503', AxiosError.ERR_BAD_RESPONSE, config, null,
        respond(config, 'unavailable', 503));
    });

    const result = await service.fetchPairs();

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe('DexScreener search failed: HTTP 503');
      expect(result.error.status).toBe(503);
    }
  });

  it('should reject a body that is not an object', async () => {
    const service = serviceReturning(async (config) => respond(config, '<html>maintenance</html>'));

    const result = await service.fetchPairs();

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe('DexScreener returned an unusable body: Expected a JSON object, got string');
    }
  });

  it('should reject a pairs field that is not an array', async () => {
    const service = serviceReturning(async (config) => respond(config, { pairs: { a: 1 } }));
    const result = await service.fetchPairs();
    expect(!result.ok && result.error.message)
      .toBe('DexScreener returned an unusable body: Expected "pairs" to be an array, got object');
  });
});
