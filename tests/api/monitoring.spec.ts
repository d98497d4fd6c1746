import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import path from 'node:path';
import request from 'supertest';
import type { Express } from 'express';
import { createApiApp } from '../../src/api/router.js';
import { clearSensitiveValuesForTests } from '../../src/utils/logger.js';
import { createTestRuntime, TEST_WEBHOOK_URL, type TestRuntime } from '../harness/runtime.js';

describe('monitoring control plane', () => {
    let runtime: TestRuntime;
    let app: Express;

    beforeEach(async () => {
        runtime = await createTestRuntime();
        app = createApiApp({ controller: runtime.controller, logChannel: runtime.logChannel });
    });

    afterEach(async () => {
        await runtime.dispose();
        clearSensitiveValuesForTests();
    });

    describe('GET /monitoring', () => {
        it('reports an idle session', async () => {
            const res = await request(app).get('/monitoring');

            expect(res.status).toBe(200);
            expect(res.body.ok).toBe(true);
            expect(res.body.data).toEqual({
                state: 'idle',
                directory: null,
                uploadDelaySeconds: null,
                deleteAfterUpload: null,
                startedAt: null,
                pendingFiles: 0,
            });
            expect(typeof res.body.correlationId).toBe('string');
        });
    });

    describe('POST /monitoring/start', () => {
        it('returns 400 with every configuration issue when nothing is configured', async () => {
            const res = await request(app).post('/monitoring/start');

            expect(res.status).toBe(400);
            expect(res.body.ok).toBe(false);
            expect(res.body.error).toBe('Invalid watch configuration: Watch directory is not set. Webhook URL is not set.');
            expect(res.body.data).toEqual({ issues: ['Watch directory is not set.', 'Webhook URL is not set.'] });
        });

        it('starts monitoring the configured directory', async () => {
            await runtime.saveConfig({ watchDirectory: runtime.watchDir, webhookUrl: TEST_WEBHOOK_URL });

            const res = await request(app).post('/monitoring/start');

            expect(res.status).toBe(200);
            expect(res.body.data.state).toBe('running');
            expect(res.body.data.directory).toBe(runtime.watchDir);
            expect(res.body.data.uploadDelaySeconds).toBe(2);
            expect(runtime.sources).toHaveLength(1);
        });

        it('returns 409 when monitoring is already running', async () => {
            await runtime.saveConfig({ watchDirectory: runtime.watchDir, webhookUrl: TEST_WEBHOOK_URL });
            await request(app).post('/monitoring/start');

            const res = await request(app).post('/monitoring/start');

            expect(res.status).toBe(409);
            expect(res.body.error).toBe('Monitoring is already running.');
            expect(runtime.sources).toHaveLength(1);
        });
    });

    describe('POST /monitoring/stop', () => {
        it('stops a running session', async () => {
            await runtime.saveConfig({ watchDirectory: runtime.watchDir, webhookUrl: TEST_WEBHOOK_URL });
            await request(app).post('/monitoring/start');

            const res = await request(app).post('/monitoring/stop');

            expect(res.status).toBe(200);
            expect(res.body.data.state).toBe('idle');
            expect(runtime.sources[0].watching).toBe(false);
        });

        it('is harmless when nothing is running', async () => {
            const res = await request(app).post('/monitoring/stop');

            expect(res.status).toBe(200);
            expect(res.body.data.state).toBe('idle');
        });
    });

    describe('PATCH /monitoring/settings', () => {
        it('applies a new delay to the running session', async () => {
            await runtime.saveConfig({ watchDirectory: runtime.watchDir, webhookUrl: TEST_WEBHOOK_URL });
            await request(app).post('/monitoring/start');

            const res = await request(app)
                .patch('/monitoring/settings')
                .send({ uploadDelaySeconds: 7, deleteAfterUpload: true });

            expect(res.status).toBe(200);
            expect(res.body.data.uploadDelaySeconds).toBe(7);
            expect(res.body.data.deleteAfterUpload).toBe(true);
        });

        it('rejects fields of the wrong type', async () => {
            const res = await request(app)
                .patch('/monitoring/settings')
                .send({ uploadDelaySeconds: '5', deleteAfterUpload: 'yes' });

            expect(res.status).toBe(400);
            expect(res.body.error).toBe('Invalid settings payload.');
            expect(res.body.data).toEqual({
                issues: ['uploadDelaySeconds must be a number.', 'deleteAfterUpload must be a boolean.'],
            });
        });

        it('rejects an empty payload', async () => {
            const res = await request(app).patch('/monitoring/settings').send({});

            expect(res.status).toBe(400);
            expect(res.body.data).toEqual({ issues: ['Provide uploadDelaySeconds and/or deleteAfterUpload.'] });
        });

        it('rejects a delay outside 0..30', async () => {
            const res = await request(app).patch('/monitoring/settings').send({ uploadDelaySeconds: 31 });

            expect(res.status).toBe(400);
            expect(res.body.data).toEqual({
                issues: ['Upload delay must be a whole number between 0 and 30 seconds.'],
            });
        });
    });

    describe('GET /monitoring/logs', () => {
        it('returns the most recent activity, oldest first', async () => {
            await runtime.saveConfig({ watchDirectory: runtime.watchDir, webhookUrl: TEST_WEBHOOK_URL });
            await request(app).post('/monitoring/start');

            runtime.sources[0].emit({ path: path.join(runtime.watchDir, 'a.png') });
            await vi.waitFor(() => expect(runtime.logChannel.stats().published).toBe(3));

            const res = await request(app).get('/monitoring/logs').query({ limit: 2 });

            expect(res.status).toBe(200);
            expect(res.body.data.dropped).toBe(0);
            expect(res.body.data.events.map((event: { message: string }) => event.message)).toEqual([
                'Detected a.png.',
                'Uploaded a.png in 0.12 sec (total: 0.90 sec).',
            ]);
        });

        it('falls back to the default limit for nonsense values', async () => {
            runtime.logChannel.publish({ timestampMs: 1, level: 'info', message: 'only entry' });

            const res = await request(app).get('/monitoring/logs').query({ limit: 'lots' });

            expect(res.status).toBe(200);
            expect(res.body.data.events).toEqual([{ timestampMs: 1, level: 'info', message: 'only entry' }]);
        });

        it('treats a fractional limit below one as the default', async () => {
            runtime.logChannel.publish({ timestampMs: 1, level: 'info', message: 'first' });
            runtime.logChannel.publish({ timestampMs: 2, level: 'info', message: 'second' });

            const res = await request(app).get('/monitoring/logs').query({ limit: '0.5' });

            expect(res.status).toBe(200);
            expect(res.body.data.events.map((event: { message: string }) => event.message)).toEqual(['first', 'second']);
        });

        it('rounds a fractional limit down', async () => {
            runtime.logChannel.publish({ timestampMs: 1, level: 'info', message: 'first' });
            runtime.logChannel.publish({ timestampMs: 2, level: 'info', message: 'second' });

            const res = await request(app).get('/monitoring/logs').query({ limit: '1.9' });

            expect(res.body.data.events.map((event: { message: string }) => event.message)).toEqual(['second']);
        });
    });

    it('answers unknown routes with a 404 envelope', async () => {
        const res = await request(app).get('/nope');

        expect(res.status).toBe(404);
        expect(res.body).toMatchObject({ ok: false, error: 'Not found.' });
    });
});
