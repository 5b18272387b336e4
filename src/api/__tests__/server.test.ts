import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import axios, { type AxiosRequestConfig, type AxiosResponse } from 'axios';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import type { Server } from 'http';
import { createApp } from '../../server.js';
import { DEFAULT_EXPORT_CONFIG } from '../../config/exportConfig.js';
import { KomootApi } from '../../crawler/komoot/komootApi.js';
import { KomootCrawler } from '../../crawler/komoot/komootCrawler.js';
import { KomootParser } from '../../crawler/komoot/komootParser.js';
import { HttpClient } from '../../crawler/komoot/utils/httpClient.js';
import { JobStatusStore } from '../../jobs/jobStatus.js';
import { CollectionManager } from '../../services/collectionManager.js';
import type { ExportServices } from '../../services/index.js';
import { TourResolver, type TourStrategy } from '../../services/tourResolver.js';
import type { Collection, Tour } from '../../types/index.js';
import type { TourResultRow } from '../../types/jobs.js';

const UUID = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/;

// Resolves only once the test opens the gate
function gatedStrategy() {
  let open: () => void = () => undefined;
  const gate = new Promise<void>(resolve => {
    open = resolve;
  });
  const strategy: TourStrategy = {
    name: 'gated',
    resolve: async (tourId: string): Promise<Tour> => {
      await gate;
      return { id: tourId, name: 'Gate Climb', distance_km: 4, track_points: [{ lat: 1, lon: 2 }] };
    },
  };
  return { strategy, open: () => open() };
}

function buildServices(outputDir: string, strategies: TourStrategy[]): ExportServices {
  const config = { ...DEFAULT_EXPORT_CONFIG, outputDir };
  const http = new HttpClient({
    retries: 1,
    adapter: async () => {
      throw new Error('network is not available in tests');
    },
  });
  const parser = new KomootParser();
  const api = new KomootApi(http, { apiBaseUrl: config.apiBaseUrl, webBaseUrl: config.webBaseUrl });

  return {
    config,
    http,
    parser,
    api,
    crawler: new KomootCrawler(http, { webBaseUrl: config.webBaseUrl }, parser),
    resolver: new TourResolver(strategies),
    manager: new CollectionManager(outputDir),
    tourJobs: new JobStatusStore<TourResultRow>('tours'),
    collectionJobs: new JobStatusStore<Collection>('collections'),
  };
}

describe('HTTP API', () => {
  let dir: string;
  let server: Server;
  let baseUrl: string;
  let services: ExportServices;
  let gated: ReturnType<typeof gatedStrategy>;

  async function call(method: 'get' | 'post', url: string, data?: unknown): Promise<AxiosResponse> {
    const config: AxiosRequestConfig = { method, url: `${baseUrl}${url}`, data, validateStatus: () => true };
    return axios.request(config);
  }

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'export-api-'));
    gated = gatedStrategy();
    services = buildServices(dir, [gated.strategy]);
    server = await new Promise<Server>(resolve => {
      const listening = createApp(services).listen(0, '127.0.0.1', () => resolve(listening));
    });
    const address = server.address();
    if (address === null || typeof address === 'string') throw new Error('server has no port');
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    gated.open();
    await vi.waitFor(() => expect(services.tourJobs.isRunning()).toBe(false));
    await new Promise<void>((resolve, reject) => server.close(error => (error ? reject(error) : resolve())));
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('answers 202 with the job id carried in the status snapshot', async () => {
    const started = await call('post', '/api/start', { anonymous: true, tourSelection: '5' });

    expect(started.status).toBe(202);
    expect(started.data.status).toBe('started');
    expect(started.data.job_id).toMatch(UUID);

    const status = await call('get', '/api/status');
    expect(status.data).toMatchObject({ job_id: started.data.job_id, status: 'running', found: 1 });

    gated.open();
    await vi.waitFor(() => expect(services.tourJobs.snapshot().status).toBe('completed'));
    const results = await call('get', '/api/results');
    expect(results.data.results).toHaveLength(1);
    expect(results.data.results[0]).toMatchObject({ id: '5', name: 'Gate Climb', filename: 'Gate-Climb-5.gpx', source: 'gated' });
  });

  it('refuses to clear tour results while the job runs', async () => {
    await call('post', '/api/start', { anonymous: true, tourSelection: ['7'] });

    const refused = await call('post', '/api/clear');
    expect(refused.status).toBe(409);
    expect(refused.data).toEqual({ error: 'A tour job is still running' });

    gated.open();
    await vi.waitFor(() => expect(services.tourJobs.snapshot().status).toBe('completed'));

    const cleared = await call('post', '/api/clear');
    expect(cleared.status).toBe(200);
    expect(cleared.data).toEqual({ status: 'cleared' });
    expect((await call('get', '/api/status')).data).toMatchObject({ status: 'idle', job_id: null, results: [] });
  });

  it('answers 404 for enhancement without stored collections and starts nothing', async () => {
    const response = await call('post', '/api/enhance-collections', { userId: 'nobody' });

    expect(response.status).toBe(404);
    expect(response.data).toEqual({ error: 'No collections directory for user nobody' });
    expect(services.collectionJobs.snapshot()).toMatchObject({ status: 'idle', job_id: null });
  });

  it('answers 400 with the first validation message', async () => {
    const badEmail = await call('post', '/api/collections/personal', { email: 'not-an-email', password: 'test-secret' });
    expect(badEmail.status).toBe(400);
    expect(badEmail.data).toEqual({ error: 'Invalid email address' });

    const anonymousWithCredentials = await call('post', '/api/start', {
      anonymous: true,
      email: 'rider@example.test',
      tourSelection: '5',
    });
    expect(anonymousWithCredentials.status).toBe(400);
    expect(anonymousWithCredentials.data).toEqual({ error: 'Anonymous mode does not take credentials' });

    const noUrls = await call('post', '/api/collections/public', {});
    expect(noUrls.status).toBe(400);
    expect(noUrls.data).toEqual({ error: 'At least one collection URL is required' });

    expect(services.tourJobs.snapshot().status).toBe('idle');
    expect(services.collectionJobs.snapshot().status).toBe('idle');
  });

  it('rejects a malformed tour id for downloads', async () => {
    const response = await call('get', '/api/download/abc');

    expect(response.status).toBe(400);
    expect(response.data).toEqual({ error: 'Invalid tour id' });
  });

  it('reports job states on /health', async () => {
    const response = await call('get', '/health');

    expect(response.status).toBe(200);
    expect(response.data).toMatchObject({
      status: 'ok',
      jobs: { tours: 'idle', collections: 'idle' },
      detailed_tour_api: true,
    });
  });

  it('answers CORS preflights from allowed origins only', async () => {
    const allowed = await axios.request({
      method: 'options',
      url: `${baseUrl}/api/start`,
      headers: { Origin: 'http://localhost:5000' },
      validateStatus: () => true,
    });
    expect(allowed.status).toBe(204);
    expect(allowed.headers['access-control-allow-origin']).toBe('http://localhost:5000');

    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const blocked = await axios.request({
      method: 'options',
      url: `${baseUrl}/api/start`,
      headers: { Origin: 'http://elsewhere.test' },
      validateStatus: () => true,
    });
    expect(blocked.status).toBe(403);
    warn.mockRestore();
  });
});
