import { Router, Request, Response } from 'express';
import { TaskStore } from '../../application/TaskStore';
import { PipelineOrchestrator } from '../../application/PipelineOrchestrator';
import { IImagePreparer } from '../../domain/ports/IImagePreparer';
import { ModelVariantKey, MODEL_VARIANT_KEYS, isModelVariantKey } from '../../domain/entities/GenerationJob';
import { asyncHandler, BadRequestError } from '../middleware/errorHandler';

const DATA_URL_PATTERN = /^data:image\/[a-z0-9.+-]+;base64,/i;
const BASE64_PATTERN = /^[A-Za-z0-9+/]+={0,2}$/;

/**
 * Decodes an image sent as raw base64 or as a `data:image/...;base64,` URL.
 */
export function decodeImagePayload(image: unknown): Buffer {
    if (typeof image !== 'string' || image.trim() === '') {
        throw new BadRequestError('image is required and must be a base64 string or data URL');
    }

    const encoded = image.trim().replace(DATA_URL_PATTERN, '').replace(/\s+/g, '');
    if (!BASE64_PATTERN.test(encoded) || encoded.length % 4 === 1) {
        throw new BadRequestError('image must be base64 encoded');
    }
    return Buffer.from(encoded, 'base64');
}

export interface VideoRouteOptions {
    defaultModelVariant: ModelVariantKey;
}

/**
 * Creates image and video generation routes with dependency injection.
 */
export function createVideoRoutes(
    taskStore: TaskStore,
    orchestrator: PipelineOrchestrator,
    imagePreparer: IImagePreparer,
    options: VideoRouteOptions
): Router {
    const router = Router();

    /**
     * POST /resize
     *
     * Pads an image to the nearest supported aspect ratio and returns it immediately.
     */
    router.post(
        '/resize',
        asyncHandler(async (req: Request, res: Response) => {
            const imageBytes = decodeImagePayload(req.body?.image);
            const prepared = await imagePreparer.prepare(imageBytes);

            res.json({
                image: prepared.bytes.toString('base64'),
                mimeType: prepared.mimeType,
                width: prepared.width,
                height: prepared.height,
                originalWidth: prepared.originalWidth,
                originalHeight: prepared.originalHeight,
                originalAspectRatio: prepared.originalAspectRatio,
                targetAspectRatio: prepared.targetAspectRatio,
                padded: prepared.padded,
                upscaled: prepared.upscaled,
            });
        })
    );

    /**
     * POST /generate-video
     *
     * Starts a video generation task.
     * Returns immediately with a task ID for async polling.
     */
    router.post(
        '/generate-video',
        asyncHandler(async (req: Request, res: Response) => {
            const { image, fileName, model } = req.body ?? {};

            const imageBytes = decodeImagePayload(image);

            if (fileName !== undefined && (typeof fileName !== 'string' || fileName.trim() === '')) {
                throw new BadRequestError('fileName must be a non-empty string');
            }

            let modelVariant = options.defaultModelVariant;
            if (model !== undefined) {
                if (!isModelVariantKey(model)) {
                    throw new BadRequestError(`model must be one of: ${MODEL_VARIANT_KEYS.join(', ')}`);
                }
                modelVariant = model;
            }

            const task = taskStore.createTask({
                sourceFileName: typeof fileName === 'string' ? fileName : 'image',
                modelVariant,
            });
            console.log(`[${task.id}] Video task created (${modelVariant})`);

            // Start processing in background (don't await)
            orchestrator.processTask(task.id, imageBytes).catch((error) => {
                console.error(`Task ${task.id} failed:`, error);
            });

            res.status(202).json({
                taskId: task.id,
                status: task.stage,
                message: task.progressMessage,
            });
        })
    );

    return router;
}
