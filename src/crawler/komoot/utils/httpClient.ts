/**
 * HTTP client with browser-like headers and retry/backoff for komoot
 */

import axios, { type AxiosAdapter, type AxiosInstance, type AxiosResponse, type ResponseType } from 'axios';
import randomUseragent from 'random-useragent';
import { Logger } from './logger.js';
import { backoffDelay, sleep } from './delay.js';
import { NetworkError, errorMessage } from '../../../utils/errors.js';

export interface HttpClientConfig {
  timeout?: number;
  retries?: number;
  retryDelay?: number;
  /** Replaces the transport, used by tests */
  adapter?: AxiosAdapter;
  sleep?: (ms: number) => Promise<void>;
}

export interface RequestOptions {
  headers?: Record<string, string>;
  referer?: string;
  auth?: { username: string; password: string };
  params?: Record<string, string | number>;
  maxRetries?: number;
  timeout?: number;
  signal?: AbortSignal;
}

const FALLBACK_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0 Safari/537.36';

/**
 * Connection failures, timeouts, 429 and 5xx are worth another attempt.
 * Any other HTTP status is final.
 */
function isRetryable(error: unknown): boolean {
  if (!axios.isAxiosError(error)) return false;
  if (error.code === 'ERR_CANCELED') return false;
  const status = error.response?.status;
  if (status === undefined) return true;
  return status === 429 || status >= 500;
}

export class HttpClient {
  private client: AxiosInstance;
  private logger: Logger;
  private retries: number;
  private retryDelay: number;
  private sleep: (ms: number) => Promise<void>;

  constructor(config: HttpClientConfig = {}) {
    this.retries = config.retries || 3;
    this.retryDelay = config.retryDelay ?? 1000;
    this.sleep = config.sleep ?? sleep;
    this.logger = new Logger('HttpClient');

    this.client = axios.create({
      timeout: config.timeout || 30000,
      adapter: config.adapter,
      headers: {
        'Accept': 'text/html,application/xhtml+xml,application/xml;q=0.9,application/json;q=0.9,*/*;q=0.8',
        'Accept-Language': 'en-US,en;q=0.9,de;q=0.8',
        'Accept-Encoding': 'gzip, deflate, br',
        'Connection': 'keep-alive',
        'Upgrade-Insecure-Requests': '1',
      },
    });
  }

  private getRandomUserAgent(): string {
    return randomUseragent.getRandom() || FALLBACK_USER_AGENT;
  }

  /**
   * Issues a GET with retry. The final failure is raised as NetworkError.
   */
  async request<T>(url: string, responseType: ResponseType, options: RequestOptions = {}): Promise<AxiosResponse<T>> {
    const maxRetries = Math.max(1, options.maxRetries ?? this.retries);
    let lastError: unknown = null;
    let attempt = 0;

    while (attempt < maxRetries) {
      attempt++;
      try {
        return await this.client.get<T>(url, {
          responseType,
          params: options.params,
          auth: options.auth,
          timeout: options.timeout,
          signal: options.signal,
          headers: {
            ...options.headers,
            ...(options.referer ? { 'Referer': options.referer } : {}),
            'User-Agent': this.getRandomUserAgent(),
          },
        });
      } catch (error) {
        lastError = error;

        if (!isRetryable(error) || options.signal?.aborted) {
          break;
        }

        if (attempt < maxRetries) {
          const delay = backoffDelay(attempt, this.retryDelay);
          this.logger.warn(
            `Request failed (attempt ${attempt}/${maxRetries}), retrying in ${delay}ms...`,
            errorMessage(error)
          );
          await this.sleep(delay);
        }
      }
    }

    const status = axios.isAxiosError(lastError) ? lastError.response?.status ?? null : null;
    this.logger.error(`Request to ${url} failed after ${attempt} attempt(s):`, errorMessage(lastError));
    throw new NetworkError(`GET ${url} failed: ${errorMessage(lastError)}`, {
      url,
      status,
      attempts: attempt,
      cause: lastError,
    });
  }

  /**
   * Fetches a page body as text
   */
  async fetch(url: string, options: RequestOptions = {}): Promise<string> {
    const response = await this.request<string>(url, 'text', options);
    return typeof response.data === 'string' ? response.data : String(response.data);
  }

  async getJson(url: string, options: RequestOptions = {}): Promise<unknown> {
    const response = await this.request<unknown>(url, 'json', {
      ...options,
      headers: { 'Accept': 'application/hal+json,application/json', ...options.headers },
    });
    if (typeof response.data === 'string') {
      return JSON.parse(response.data);
    }
    return response.data;
  }

  async getBuffer(url: string, options: RequestOptions = {}): Promise<Buffer> {
    const response = await this.request<ArrayBuffer>(url, 'arraybuffer', options);
    return Buffer.from(response.data);
  }
}
