import { v2 as cloudinary, UploadApiResponse } from 'cloudinary';
import fs from 'fs';
import path from 'path';
import { IDeliveryStorage } from '../../domain/ports/IDeliveryStorage';
import { StorageError, errorMessage } from '../../domain/errors/PipelineErrors';

// Direct uploads are capped around 100MB; larger files go through chunked upload.
const DIRECT_UPLOAD_LIMIT_MB = 90;
const CHUNK_SIZE_BYTES = 6_000_000;

/**
 * Media CDN client for publishing final videos.
 */
export class MediaStorageClient implements IDeliveryStorage {
    private readonly folder: string;

    constructor(
        cloudName: string,
        apiKey: string,
        apiSecret: string,
        folder: string = 'video-reframer/videos'
    ) {
        if (!cloudName || !apiKey || !apiSecret) {
            throw new Error('Media credentials are required (cloudName, apiKey, apiSecret)');
        }

        cloudinary.config({
            cloud_name: cloudName,
            api_key: apiKey,
            api_secret: apiSecret,
            secure: true,
        });
        this.folder = folder;
    }

    async deliver(localPath: string, fileName: string): Promise<string> {
        const result = await this.uploadVideo(localPath, { publicId: path.parse(fileName).name });
        return result.url;
    }

    /**
     * Uploads a local video file.
     */
    async uploadVideo(
        localPath: string,
        options: { folder?: string; publicId?: string } = {}
    ): Promise<{ url: string; publicId: string }> {
        const folder = options.folder || this.folder;

        try {
            const stats = await fs.promises.stat(localPath);
            const fileSizeInMB = stats.size / (1024 * 1024);
            console.log(`[MediaStorage] Uploading ${localPath} (${fileSizeInMB.toFixed(2)} MB)`);

            const result = fileSizeInMB < DIRECT_UPLOAD_LIMIT_MB
                ? await cloudinary.uploader.upload(localPath, {
                    folder,
                    public_id: options.publicId,
                    resource_type: 'video',
                    overwrite: true,
                })
                : await this.uploadLarge(localPath, folder, options.publicId);

            return {
                url: result.secure_url,
                publicId: result.public_id,
            };
        } catch (error) {
            console.error('[MediaStorage] Upload failed:', error);
            throw new StorageError(`Media upload failed: ${errorMessage(error)}`, localPath, error);
        }
    }

    private uploadLarge(localPath: string, folder: string, publicId?: string): Promise<UploadApiResponse> {
        console.log('[MediaStorage] File too large for direct upload, using chunked upload_large.');
        return new Promise((resolve, reject) => {
            cloudinary.uploader.upload_large(localPath, {
                folder,
                public_id: publicId,
                resource_type: 'video',
                chunk_size: CHUNK_SIZE_BYTES,
                overwrite: true,
            }, (error, result) => {
                if (error) {
                    reject(new Error(error.message));
                } else if (!result || !result.secure_url) {
                    reject(new Error('Chunked upload returned no secure_url'));
                } else {
                    resolve(result);
                }
            });
        });
    }
}
