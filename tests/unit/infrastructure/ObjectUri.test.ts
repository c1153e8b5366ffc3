import { parseObjectUri, jobOutputUri } from '../../../src/infrastructure/storage/ObjectUri';
import { StorageError } from '../../../src/domain/errors/PipelineErrors';

describe('ObjectUri', () => {
    describe('parseObjectUri', () => {
        it('should split bucket and key', () => {
            expect(parseObjectUri('gs://test-bucket/job-1/sample_0.mp4')).toEqual({
                bucket: 'test-bucket',
                key: 'job-1/sample_0.mp4',
            });
        });

        it('should accept a bare bucket', () => {
            expect(parseObjectUri('gs://test-bucket')).toEqual({ bucket: 'test-bucket', key: '' });
            expect(parseObjectUri('gs://test-bucket/')).toEqual({ bucket: 'test-bucket', key: '' });
        });

        it('should reject other schemes', () => {
            expect(() => parseObjectUri('s3://test-bucket/key')).toThrow(StorageError);
            expect(() => parseObjectUri('https://storage.example.com/key'))
                .toThrow(`Invalid object URI "https://storage.example.com/key": must start with 'gs://'`);
            expect(() => parseObjectUri('test-bucket/key')).toThrow(StorageError);
        });

        it('should honour a custom scheme', () => {
            expect(parseObjectUri('s3://test-bucket/key', { scheme: 's3' })).toEqual({ bucket: 'test-bucket', key: 'key' });
        });

        it('should reject a missing bucket', () => {
            expect(() => parseObjectUri('gs:///key')).toThrow('Invalid object URI "gs:///key": missing bucket name');
        });

        it('should reject a missing key when one is required', () => {
            expect(() => parseObjectUri('gs://test-bucket/', { requireKey: true }))
                .toThrow('Invalid object URI "gs://test-bucket/": missing object key');
        });

        it('should keep the offending URI on the error', () => {
            try {
                parseObjectUri('ftp://host/file');
                throw new Error('expected parseObjectUri to throw');
            } catch (error) {
                expect(error).toBeInstanceOf(StorageError);
                if (error instanceof StorageError) {
                    expect(error.uri).toBe('ftp://host/file');
                }
            }
        });
    });

    describe('jobOutputUri', () => {
        it('should append the job folder with exactly one separator', () => {
            expect(jobOutputUri('gs://test-bucket', 'job-1')).toBe('gs://test-bucket/job-1/');
            expect(jobOutputUri('gs://test-bucket/outputs//', 'job-1')).toBe('gs://test-bucket/outputs/job-1/');
        });
    });
});
