import fs from 'fs';
import os from 'os';
import path from 'path';
import { GcsStorageClient } from '../../../src/infrastructure/storage/GcsStorageClient';
import { StorageError } from '../../../src/domain/errors/PipelineErrors';

const mockDownload = jest.fn();
const mockUpload = jest.fn();
const mockFile = jest.fn();
const mockBucket = jest.fn();

jest.mock('@google-cloud/storage', () => ({
    Storage: jest.fn().mockImplementation(() => ({ bucket: mockBucket })),
}));

describe('GcsStorageClient', () => {
    let tmpDir: string;
    let logSpy: jest.SpyInstance;

    beforeAll(() => {
        logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    });

    afterAll(() => {
        logSpy.mockRestore();
    });

    beforeEach(() => {
        jest.clearAllMocks();
        tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'gcs-test-'));
        mockFile.mockReturnValue({ download: mockDownload });
        mockBucket.mockReturnValue({ file: mockFile, upload: mockUpload });
    });

    afterEach(() => {
        fs.rmSync(tmpDir, { recursive: true, force: true });
    });

    describe('downloadToFile', () => {
        it('should download the object to the destination, creating its folder', async () => {
            mockDownload.mockResolvedValueOnce([]);
            const destination = path.join(tmpDir, 'task-1', 'generated.mp4');

            await new GcsStorageClient().downloadToFile('gs://test-bucket/job-1/sample_0.mp4', destination);

            expect(mockBucket).toHaveBeenCalledWith('test-bucket');
            expect(mockFile).toHaveBeenCalledWith('job-1/sample_0.mp4');
            expect(mockDownload).toHaveBeenCalledWith({ destination });
            expect(fs.existsSync(path.join(tmpDir, 'task-1'))).toBe(true);
        });

        it('should reject malformed URIs without calling the SDK', async () => {
            const client = new GcsStorageClient();

            await expect(client.downloadToFile('https://example.com/video.mp4', path.join(tmpDir, 'a.mp4')))
                .rejects.toThrow(StorageError);
            await expect(client.downloadToFile('gs://test-bucket', path.join(tmpDir, 'a.mp4')))
                .rejects.toThrow('missing object key');
            expect(mockBucket).not.toHaveBeenCalled();
        });

        it('should wrap SDK failures', async () => {
            mockDownload.mockRejectedValueOnce(new Error('403 Forbidden'));

            await expect(new GcsStorageClient().downloadToFile('gs://test-bucket/a.mp4', path.join(tmpDir, 'a.mp4')))
                .rejects.toThrow('Failed to download gs://test-bucket/a.mp4: 403 Forbidden');
        });
    });

    describe('deliver', () => {
        it('should upload under final_videos, make it public and return its URL', async () => {
            const makePublic = jest.fn().mockResolvedValue([]);
            const publicUrl = jest.fn().mockReturnValue('https://storage.googleapis.com/test-bucket/final_videos/beach.mp4');
            mockUpload.mockResolvedValueOnce([{ makePublic, publicUrl }]);

            const client = new GcsStorageClient({ bucketName: 'test-bucket' });
            const url = await client.deliver('/tmp/work/cropped.mp4', 'beach.mp4');

            expect(url).toBe('https://storage.googleapis.com/test-bucket/final_videos/beach.mp4');
            expect(mockUpload).toHaveBeenCalledWith('/tmp/work/cropped.mp4', {
                destination: 'final_videos/beach.mp4',
                contentType: 'video/mp4',
            });
            expect(makePublic).toHaveBeenCalled();
        });

        it('should honour a custom folder', async () => {
            mockUpload.mockResolvedValueOnce([{ makePublic: jest.fn(), publicUrl: jest.fn().mockReturnValue('u') }]);

            await new GcsStorageClient({ bucketName: 'test-bucket', folder: '/results/' }).deliver('/tmp/a.mp4', 'a.mp4');

            expect(mockUpload).toHaveBeenCalledWith('/tmp/a.mp4', expect.objectContaining({ destination: 'results/a.mp4' }));
        });

        it('should require a bucket', async () => {
            await expect(new GcsStorageClient().deliver('/tmp/a.mp4', 'a.mp4'))
                .rejects.toThrow('No bucket configured for publishing videos');
        });

        it('should wrap upload failures', async () => {
            mockUpload.mockRejectedValueOnce(new Error('quota exceeded'));

            await expect(new GcsStorageClient({ bucketName: 'test-bucket' }).deliver('/tmp/a.mp4', 'a.mp4'))
                .rejects.toThrow('Failed to upload /tmp/a.mp4 to gs://test-bucket/final_videos/a.mp4: quota exceeded');
        });
    });
});
