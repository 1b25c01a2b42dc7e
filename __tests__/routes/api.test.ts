import axios from 'axios';
import type { AxiosInstance } from 'axios';
import type { Server } from 'http';
import { afterEach, describe, it, expect, vi } from 'vitest';
import { createApp } from '../../app';
import QueryService from '../../services/queryService';
import { MemoryStore } from '../fixtures/memoryStore';
import { makePublished } from '../fixtures/articles';
import { NOW, buildOrchestrator, candidate, deferred } from '../fixtures/pipeline';
import type { HarnessOptions } from '../fixtures/pipeline';

const ADMIN_SECRET = 'test-secret-admin-key';

const servers: Server[] = [];

afterEach(async () => {
    await Promise.all(servers.splice(0).map(server => new Promise<void>(resolve => server.close(() => resolve()))));
});

const start = async (options: HarnessOptions & { adminSecret?: string | null; maxApi?: number } = {}) => {
    const store = options.store ?? new MemoryStore();
    const { orchestrator } = buildOrchestrator({ ...options, store });
    const query = new QueryService({ store, timeZone: 'UTC', clock: () => NOW });

    const app = createApp({
        query,
        orchestrator,
        store,
        settings: {
            corsOrigins: ['http://localhost:3000'],
            trustProxyLevel: 0,
            adminSecret: options.adminSecret === null ? undefined : options.adminSecret ?? ADMIN_SECRET,
            rateLimit: { windowMs: 60000, maxApi: options.maxApi ?? 1000 },
            redisConfigured: false,
        },
    });

    const server = await new Promise<Server>(resolve => {
        const listening = app.listen(0, '127.0.0.1', () => resolve(listening));
    });
    servers.push(server);

    const address = server.address();
    const port = typeof address === 'object' && address !== null ? address.port : 0;
    const client: AxiosInstance = axios.create({ baseURL: `http://127.0.0.1:${port}`, validateStatus: () => true });

    return { client, store, orchestrator };
};

const seeded = () => {
    const store = new MemoryStore();
    store.data.published = [
        ...[1, 2, 3].map(n => makePublished(n, { badge: 'paid', sourceName: 'Dezeen' })),
        ...[4, 5, 6, 7, 8, 9, 10].map(n => makePublished(n, { sourceName: 'Wallpaper' })),
    ];
    return store;
};

describe('article routes', () => {
    it('lists published articles with filters and pagination', async () => {
        const { client } = await start({ store: seeded() });

        const res = await client.get('/api/v1/articles', { params: { badge: 'paid', limit: 5 } });

        expect(res.status).toBe(200);
        expect(res.data.total).toBe(3);
        expect(res.data.articles).toHaveLength(3);
        expect(res.data.limit).toBe(5);
    });

    it('serves the same routes without the version prefix', async () => {
        const { client } = await start({ store: seeded() });

        const res = await client.get('/api/articles?limit=2&offset=8');

        expect(res.status).toBe(200);
        expect(res.data).toMatchObject({ total: 10, limit: 2, offset: 8 });
        expect(res.data.articles.map((a: { originalTitle: string }) => a.originalTitle)).toEqual(['Story 9', 'Story 10']);
    });

    it('keeps the first of repeated filter values', async () => {
        const { client } = await start({ store: seeded() });

        const res = await client.get('/api/articles?source=dezeen&source=wallpaper');

        expect(res.data.total).toBe(3);
    });

    it('returns a single article or 404', async () => {
        const { client } = await start({ store: seeded() });
        const id = makePublished(2).id;

        const found = await client.get(`/api/articles/${id}`);
        expect(found.status).toBe(200);
        expect(found.data.id).toBe(id);

        const missing = await client.get('/api/articles/ffffffffffff');
        expect(missing.status).toBe(404);
        expect(missing.data).toEqual({ status: 'fail', error: 'AppError', message: 'Article not found' });
    });

    it('rejects malformed ids with 400', async () => {
        const { client } = await start();

        const res = await client.get('/api/articles/not-an-id');

        expect(res.status).toBe(400);
        expect(res.data).toEqual({
            status: 'fail',
            message: 'Invalid input data',
            errors: [{ field: 'params.id', message: 'Invalid article id' }],
        });
    });

    it('lists today\'s articles and per-source counts', async () => {
        const { client } = await start({ store: seeded() });

        const today = await client.get('/api/articles/today');
        expect(today.status).toBe(200);
        expect(today.data.count).toBe(10);

        const sources = await client.get('/api/sources');
        expect(sources.data).toEqual([{ source: 'Wallpaper', count: 7 }, { source: 'Dezeen', count: 3 }]);
    });

    it('treats a bare today parameter as the today filter', async () => {
        const store = new MemoryStore();
        store.data.published = [
            makePublished(1, { sitePublishedAt: '2026-03-01T05:00:00.000Z' }),
            makePublished(2, { sitePublishedAt: '2026-02-20T05:00:00.000Z' }),
        ];
        const { client } = await start({ store });

        const res = await client.get('/api/articles?today');

        expect(res.status).toBe(200);
        expect(res.data.total).toBe(1);
        expect(res.data.articles[0].id).toBe(makePublished(1).id);

        const off = await client.get('/api/articles?today=false');
        expect(off.data.total).toBe(2);
    });

    it('answers unknown API paths with JSON 404', async () => {
        const { client } = await start();

        const res = await client.get('/api/v1/unknown');

        expect(res.status).toBe(404);
        expect(res.data).toEqual({ success: false, message: 'API Endpoint Not Found', path: '/api/v1/unknown' });
    });

    it('rate limits API requests', async () => {
        const { client } = await start({ maxApi: 2 });

        await client.get('/api/sources');
        await client.get('/api/sources');
        const limited = await client.get('/api/sources');

        expect(limited.status).toBe(429);
        expect(limited.data).toEqual({ status: 'fail', message: 'Too many requests, please try again later.' });
    });
});

describe('system routes', () => {
    it('reports health with article totals', async () => {
        const { client } = await start({ store: seeded() });

        const res = await client.get('/health');

        expect(res.status).toBe(200);
        expect(res.data).toEqual({
            status: 'OK',
            store: 'UP',
            redis: 'DISABLED',
            totalArticles: 10,
            lastUpdated: '2026-03-01T07:00:00.000Z',
        });
    });

    it('reports a down store as 503', async () => {
        const store = new MemoryStore();
        store.ping = async () => false;
        const { client } = await start({ store });

        const res = await client.get('/health');

        expect(res.status).toBe(503);
        expect(res.data.status).toBe('DEGRADED');
        expect(res.data.store).toBe('DOWN');
    });
});

describe('job routes', () => {
    const pools = () => ({
        'Source A': [candidate(1, 'Source A', 80), candidate(2, 'Source A', 60)],
        'Source B': [candidate(3, 'Source B', 90)],
    });

    it('requires the admin key', async () => {
        const { client } = await start({ pools: pools() });

        const missing = await client.post('/api/jobs/run');
        const wrong = await client.post('/api/jobs/run', null, { headers: { 'x-admin-key': 'not-the-admin-key' } });

        expect(missing.status).toBe(403);
        expect(wrong.status).toBe(403);
        expect(wrong.data.message).toBe('Unauthorized. Invalid Admin Key.');
    });

    it('stays closed when no admin secret is configured', async () => {
        const { client } = await start({ pools: pools(), adminSecret: null });

        const res = await client.get('/api/jobs/status', { params: { key: ADMIN_SECRET } });

        expect(res.status).toBe(403);
        expect(res.data.message).toBe('Unauthorized. Admin access is not configured.');
    });

    it('accepts a run, rejects an overlapping one and reports status', async () => {
        const gate = deferred();
        const { client, orchestrator, store } = await start({ pools: pools(), gate: gate.promise });
        const headers = { 'x-admin-key': ADMIN_SECRET };

        const accepted = await client.post('/api/jobs/run', null, { headers });
        expect(accepted.status).toBe(202);
        expect(accepted.data).toEqual({ status: 'accepted', runId: 'run-1' });

        const rejected = await client.post('/api/jobs/run', null, { headers });
        expect(rejected.status).toBe(409);
        expect(rejected.data).toMatchObject({ status: 'fail', error: 'RunInProgressError', activeRunId: 'run-1' });

        const running = await client.get('/api/v1/jobs/status', { headers });
        expect(running.data).toMatchObject({ active: true, activeRunId: 'run-1', state: 'fetching' });

        gate.resolve();
        await vi.waitFor(async () => {
            expect((await orchestrator.getStatus()).active).toBe(false);
        });
        expect(store.data.published).toHaveLength(3);
    });

    it('waits for the summary when asked', async () => {
        const { client } = await start({ pools: pools() });

        const res = await client.post('/api/jobs/run?wait=true', null, { params: { key: ADMIN_SECRET } });

        expect(res.status).toBe(200);
        expect(res.data).toMatchObject({ runId: 'run-1', outcome: 'completed', selected: 3, published: 3 });
    });

    it('validates the wait flag', async () => {
        const { client } = await start({ pools: pools() });

        const res = await client.post('/api/jobs/run?wait=sometimes', null, { headers: { 'x-admin-key': ADMIN_SECRET } });

        expect(res.status).toBe(400);
        expect(res.data.errors[0].field).toBe('query.wait');
    });
});
