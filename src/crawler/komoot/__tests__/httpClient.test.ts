import { describe, it, expect, vi } from 'vitest';
import { AxiosError, type AxiosResponse, type InternalAxiosRequestConfig } from 'axios';
import { HttpClient } from '../utils/httpClient.js';
import { NetworkError } from '../../../utils/errors.js';

function ok(config: InternalAxiosRequestConfig, data: unknown): AxiosResponse {
  return { data, status: 200, statusText: 'OK', headers: {}, config };
}

function failed(config: InternalAxiosRequestConfig, status: number): AxiosError {
  const response: AxiosResponse = { data: '', status, statusText: 'Error', headers: {}, config };
  return new AxiosError(`Request failed with status code ${status}`, AxiosError.ERR_BAD_RESPONSE, config, undefined, response);
}

describe('HttpClient', () => {
  it('retries connection failures with exponential backoff and then raises NetworkError', async () => {
    const delays: number[] = [];
    const adapter = vi.fn(async (config: InternalAxiosRequestConfig): Promise<AxiosResponse> => {
      throw new AxiosError('socket hang up', 'ECONNRESET', config);
    });
    const client = new HttpClient({
      adapter,
      sleep: async (ms) => {
        delays.push(ms);
      },
    });

    const error = await client.fetch('https://www.komoot.com/collection/1').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(NetworkError);
    expect(adapter).toHaveBeenCalledTimes(3);
    expect(delays).toEqual([1000, 2000]);
    if (error instanceof NetworkError) {
      expect(error.attempts).toBe(3);
      expect(error.status).toBeNull();
    }
  });

  it('does not retry a 404', async () => {
    const sleep = vi.fn(async () => {});
    const adapter = vi.fn(async (config: InternalAxiosRequestConfig): Promise<AxiosResponse> => {
      throw failed(config, 404);
    });
    const client = new HttpClient({ adapter, sleep });

    const error = await client.fetch('https://www.komoot.com/tour/404').catch((e: unknown) => e);

    expect(adapter).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
    expect(error).toBeInstanceOf(NetworkError);
    if (error instanceof NetworkError) {
      expect(error.status).toBe(404);
      expect(error.attempts).toBe(1);
    }
  });

  it('retries a 503 and returns the later success', async () => {
    let calls = 0;
    const adapter = vi.fn(async (config: InternalAxiosRequestConfig): Promise<AxiosResponse> => {
      calls++;
      if (calls === 1) throw failed(config, 503);
      return ok(config, '<html>fine</html>');
    });
    const client = new HttpClient({ adapter, sleep: async () => {} });

    await expect(client.fetch('https://www.komoot.com/collection/2')).resolves.toBe('<html>fine</html>');
    expect(adapter).toHaveBeenCalledTimes(2);
  });

  it('honours a per-request attempt limit', async () => {
    const adapter = vi.fn(async (config: InternalAxiosRequestConfig): Promise<AxiosResponse> => {
      throw new AxiosError('timeout of 30000ms exceeded', 'ECONNABORTED', config);
    });
    const client = new HttpClient({ adapter, sleep: async () => {} });

    await expect(client.fetch('https://www.komoot.com/x', { maxRetries: 1 })).rejects.toBeInstanceOf(NetworkError);
    expect(adapter).toHaveBeenCalledTimes(1);
  });

  it('sends a User-Agent and the referer header', async () => {
    let seen: InternalAxiosRequestConfig | undefined;
    const adapter = vi.fn(async (config: InternalAxiosRequestConfig): Promise<AxiosResponse> => {
      seen = config;
      return ok(config, { ok: true });
    });
    const client = new HttpClient({ adapter });

    await expect(client.getJson('https://api.komoot.de/v007/tours/1', { referer: 'https://www.komoot.com/' }))
      .resolves.toEqual({ ok: true });
    expect(seen?.headers.get('Referer')).toBe('https://www.komoot.com/');
    expect(typeof seen?.headers.get('User-Agent')).toBe('string');
  });
});
