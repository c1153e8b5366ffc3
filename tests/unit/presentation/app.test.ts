import fs from 'fs';
import os from 'os';
import path from 'path';
import request from 'supertest';
import { createApp, createDependencies, startTaskEviction } from '../../../src/presentation/app';
import { TaskStore } from '../../../src/application/TaskStore';
import { Config } from '../../../src/config';

jest.mock('@google-cloud/storage', () => ({
    Storage: jest.fn().mockImplementation(() => ({ bucket: jest.fn() })),
}));

jest.mock('google-auth-library', () => ({
    GoogleAuth: jest.fn().mockImplementation(() => ({ getAccessToken: jest.fn() })),
}));

describe('createApp', () => {
    let tmpDir: string;
    let logSpy: jest.SpyInstance;
    let warnSpy: jest.SpyInstance;

    beforeAll(() => {
        logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
        warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    });

    afterAll(() => {
        logSpy.mockRestore();
        warnSpy.mockRestore();
    });

    beforeEach(() => {
        tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'app-test-'));
    });

    afterEach(() => {
        fs.rmSync(tmpDir, { recursive: true, force: true });
    });

    function testConfig(): Config {
        return {
            port: 0,
            environment: 'test',
            maxUploadMb: 1,
            gcpProjectId: 'test-project',
            gcpRegion: 'us-central1',
            gcsBucket: 'test-bucket',
            outputUriPrefix: 'gs://test-bucket',
            videoModelVariant: 'veo-3-fast',
            veo2DurationSeconds: 8,
            veo3Resolution: '720p',
            pollIntervalMs: 1000,
            pollMaxAttempts: 0,
            pollRequestKey: 'name',
            promptGenerationEnabled: false,
            promptModel: 'gemini-2.5-flash',
            defaultVideoPrompt: 'Gentle camera drift.',
            deliveryStorage: 'local',
            resultsDir: path.join(tmpDir, 'results'),
            workDir: path.join(tmpDir, 'work'),
            cloudinaryCloudName: '',
            cloudinaryApiKey: '',
            cloudinaryApiSecret: '',
            taskRetentionMinutes: 60,
        };
    }

    it('should report health', async () => {
        const res = await request(createApp(testConfig())).get('/health');

        expect(res.status).toBe(200);
        expect(res.body.status).toBe('ok');
        expect(res.body.version).toBe('1.0.0');
    });

    it('should mount the task routes at the root', async () => {
        const app = createApp(testConfig());

        const list = await request(app).get('/tasks');
        expect(list.body).toEqual({ total: 0, tasks: [] });

        const missing = await request(app).get('/tasks/task_unknown');
        expect(missing.status).toBe(404);
    });

    it('should serve locally delivered videos', async () => {
        const config = testConfig();
        fs.mkdirSync(config.resultsDir, { recursive: true });
        fs.writeFileSync(path.join(config.resultsDir, 'beach_cropped_1.mp4'), 'video-bytes');

        const res = await request(createApp(config)).get('/videos/beach_cropped_1.mp4');

        expect(res.status).toBe(200);
        expect(res.headers['content-type']).toBe('video/mp4');
    });

    it('should expose the local results folder only for local delivery', () => {
        const config = testConfig();

        expect(createDependencies(config).localResults?.getResultsDir()).toBe(path.resolve(config.resultsDir));
        expect(createDependencies({ ...config, deliveryStorage: 'gcs' }).localResults).toBeNull();
        expect(createDependencies({
            ...config,
            deliveryStorage: 'cloudinary',
            cloudinaryCloudName: 'cloud',
            cloudinaryApiKey: 'key',
            cloudinaryApiSecret: 'test-secret',
        }).localResults).toBeNull();
    });

    it('should not serve a videos folder when delivering to Cloud Storage', async () => {
        const config = { ...testConfig(), deliveryStorage: 'gcs' as const };
        fs.mkdirSync(config.resultsDir, { recursive: true });
        fs.writeFileSync(path.join(config.resultsDir, 'beach_cropped_1.mp4'), 'video-bytes');

        const res = await request(createApp(config)).get('/videos/beach_cropped_1.mp4');

        expect(res.status).toBe(404);
    });

    it('should reject invalid uploads before creating a task', async () => {
        const res = await request(createApp(testConfig())).post('/api/generate-video').send({ image: 42 });

        expect(res.status).toBe(400);
        expect(res.body.error.code).toBe('BadRequestError');
    });
});

describe('startTaskEviction', () => {
    beforeEach(() => {
        jest.useFakeTimers();
    });

    afterEach(() => {
        jest.useRealTimers();
    });

    it('should drop finished tasks once they are older than the retention', () => {
        const logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
        const store = new TaskStore();
        const failed = store.createTask({ sourceFileName: 'a.png', modelVariant: 'veo-2' });
        store.failTask(failed.id, 'boom');
        const running = store.createTask({ sourceFileName: 'b.png', modelVariant: 'veo-2' });

        const timer = startTaskEviction(store, 1);
        jest.advanceTimersByTime(60_000);

        expect(store.getTask(failed.id)).toBeNull();
        expect(store.getTask(running.id)).not.toBeNull();
        expect(logSpy).toHaveBeenCalledWith('[TaskStore] Evicted 1 finished task(s)');

        clearInterval(timer);
        logSpy.mockRestore();
    });
});
