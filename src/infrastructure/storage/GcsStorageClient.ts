import fs from 'fs';
import path from 'path';
import { Storage } from '@google-cloud/storage';
import { IObjectStorageClient } from '../../domain/ports/IObjectStorageClient';
import { IDeliveryStorage } from '../../domain/ports/IDeliveryStorage';
import { StorageError, errorMessage } from '../../domain/errors/PipelineErrors';
import { parseObjectUri } from './ObjectUri';

export interface GcsStorageOptions {
    /** Bucket final videos are published to */
    bucketName?: string;
    /** Folder inside the bucket for published videos */
    folder?: string;
    projectId?: string;
}

/**
 * Cloud Storage client: downloads generated videos and publishes final ones.
 */
export class GcsStorageClient implements IObjectStorageClient, IDeliveryStorage {
    private readonly storage: Storage;
    private readonly bucketName?: string;
    private readonly folder: string;

    constructor(options: GcsStorageOptions = {}, storage?: Storage) {
        this.storage = storage ?? new Storage({ projectId: options.projectId });
        this.bucketName = options.bucketName;
        this.folder = (options.folder ?? 'final_videos').replace(/^\/+|\/+$/g, '');
    }

    async downloadToFile(uri: string, destinationPath: string): Promise<void> {
        const { bucket, key } = parseObjectUri(uri, { requireKey: true });

        console.log(`[GCS] Downloading ${uri} to ${destinationPath}`);
        try {
            await fs.promises.mkdir(path.dirname(destinationPath), { recursive: true });
            await this.storage.bucket(bucket).file(key).download({ destination: destinationPath });
        } catch (error) {
            throw new StorageError(`Failed to download ${uri}: ${errorMessage(error)}`, uri, error);
        }
    }

    async deliver(localPath: string, fileName: string): Promise<string> {
        if (!this.bucketName) {
            throw new StorageError('No bucket configured for publishing videos');
        }

        const destination = this.folder ? `${this.folder}/${fileName}` : fileName;
        const target = `gs://${this.bucketName}/${destination}`;

        console.log(`[GCS] Uploading ${localPath} to ${target}`);
        try {
            const [file] = await this.storage.bucket(this.bucketName).upload(localPath, {
                destination,
                contentType: 'video/mp4',
            });
            await file.makePublic();
            return file.publicUrl();
        } catch (error) {
            throw new StorageError(`Failed to upload ${localPath} to ${target}: ${errorMessage(error)}`, target, error);
        }
    }
}
