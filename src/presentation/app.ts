import express, { Application, Request, Response } from 'express';
import cors from 'cors';
import { Config } from '../config';
import { TaskStore } from '../application/TaskStore';
import { PipelineOrchestrator } from '../application/PipelineOrchestrator';

// Infrastructure imports
import { SharpImagePreparer } from '../infrastructure/images/SharpImagePreparer';
import { GoogleCredentialProvider } from '../infrastructure/auth/GoogleCredentialProvider';
import { VertexEndpoints } from '../infrastructure/generation/VertexEndpoints';
import { VeoJobSubmitter } from '../infrastructure/generation/VeoJobSubmitter';
import { VeoOperationPoller } from '../infrastructure/generation/VeoOperationPoller';
import { FFmpegVideoCropper } from '../infrastructure/video/FFmpegVideoCropper';
import { GcsStorageClient } from '../infrastructure/storage/GcsStorageClient';
import { LocalResultsStorage } from '../infrastructure/storage/LocalResultsStorage';
import { MediaStorageClient } from '../infrastructure/storage/MediaStorageClient';
import { GeminiPromptGenerator } from '../infrastructure/llm/GeminiPromptGenerator';
import { IDeliveryStorage } from '../domain/ports/IDeliveryStorage';
import { IImagePreparer } from '../domain/ports/IImagePreparer';
import { IPromptGenerator } from '../domain/ports/IPromptGenerator';
import { ICredentialProvider } from '../domain/ports/ICredentialProvider';

// Route imports
import { createVideoRoutes } from './routes/videoRoutes';
import { createTaskRoutes } from './routes/taskRoutes';
import { errorHandler } from './middleware/errorHandler';

const EVICTION_INTERVAL_MS = 60_000;

/**
 * Creates and configures the Express application.
 */
export function createApp(config: Config): Application {
    const app = express();

    // Middleware
    app.use(cors());
    app.use(express.json({ limit: `${config.maxUploadMb}mb` }));

    // Health check
    app.get('/health', (req: Request, res: Response) => {
        res.json({
            status: 'ok',
            timestamp: new Date().toISOString(),
            version: '1.0.0',
        });
    });

    // Create dependencies
    const { taskStore, orchestrator, imagePreparer, localResults } = createDependencies(config);

    if (localResults) {
        app.use('/videos', express.static(localResults.getResultsDir()));
    }

    // Routes
    app.use('/api', createVideoRoutes(taskStore, orchestrator, imagePreparer, {
        defaultModelVariant: config.videoModelVariant,
    }));
    app.use(createTaskRoutes(taskStore));

    // Error handler (must be last)
    app.use(errorHandler);

    startTaskEviction(taskStore, config.taskRetentionMinutes);

    return app;
}

/**
 * Creates all dependencies with proper wiring.
 */
export function createDependencies(config: Config): {
    taskStore: TaskStore;
    orchestrator: PipelineOrchestrator;
    imagePreparer: IImagePreparer;
    localResults: LocalResultsStorage | null;
} {
    const taskStore = new TaskStore();
    const imagePreparer = new SharpImagePreparer();
    const credentialProvider = new GoogleCredentialProvider();
    const endpoints = new VertexEndpoints({
        projectId: config.gcpProjectId,
        location: config.gcpRegion,
    });
    const gcsClient = new GcsStorageClient({
        bucketName: config.gcsBucket,
        projectId: config.gcpProjectId,
    });
    const { deliveryStorage, localResults } = createDeliveryStorage(config, gcsClient);

    const orchestrator = new PipelineOrchestrator({
        taskStore,
        imagePreparer,
        jobSubmitter: new VeoJobSubmitter(endpoints, credentialProvider),
        operationPoller: new VeoOperationPoller(endpoints, {
            pollIntervalMs: config.pollIntervalMs,
            maxAttempts: config.pollMaxAttempts,
            requestKey: config.pollRequestKey,
        }),
        credentialProvider,
        objectStorage: gcsClient,
        videoCropper: new FFmpegVideoCropper(),
        deliveryStorage,
        promptGenerator: createPromptGenerator(config, endpoints, credentialProvider),
        defaultPrompt: config.defaultVideoPrompt,
        outputUriPrefix: config.outputUriPrefix,
        workDir: config.workDir,
        variantSettings: {
            veo3Resolution: config.veo3Resolution,
            veo2DurationSeconds: config.veo2DurationSeconds,
        },
    });

    console.log(`📦 Delivery storage: ${config.deliveryStorage}`);
    console.log(`🎥 Default model variant: ${config.videoModelVariant}`);

    return { taskStore, orchestrator, imagePreparer, localResults };
}

/**
 * Picks the delivery target. The local target is also returned on its own so
 * the app can serve its folder.
 */
function createDeliveryStorage(config: Config, gcsClient: GcsStorageClient): {
    deliveryStorage: IDeliveryStorage;
    localResults: LocalResultsStorage | null;
} {
    switch (config.deliveryStorage) {
        case 'local': {
            const localResults = new LocalResultsStorage(config.resultsDir);
            return { deliveryStorage: localResults, localResults };
        }
        case 'gcs':
            return { deliveryStorage: gcsClient, localResults: null };
        case 'cloudinary':
            return {
                deliveryStorage: new MediaStorageClient(
                    config.cloudinaryCloudName,
                    config.cloudinaryApiKey,
                    config.cloudinaryApiSecret
                ),
                localResults: null,
            };
    }
}

function createPromptGenerator(
    config: Config,
    endpoints: VertexEndpoints,
    credentialProvider: ICredentialProvider
): IPromptGenerator | undefined {
    if (!config.promptGenerationEnabled) {
        console.log('📝 Prompt generation disabled, using the default prompt');
        return undefined;
    }
    return new GeminiPromptGenerator(endpoints, credentialProvider, config.promptModel, config.defaultVideoPrompt);
}

/**
 * Periodically drops finished tasks. The timer does not keep the process alive.
 */
export function startTaskEviction(taskStore: TaskStore, retentionMinutes: number): NodeJS.Timeout {
    const maxAgeMs = retentionMinutes * 60_000;
    const timer = setInterval(() => {
        const evicted = taskStore.evictFinished(maxAgeMs);
        if (evicted > 0) {
            console.log(`[TaskStore] Evicted ${evicted} finished task(s)`);
        }
    }, EVICTION_INTERVAL_MS);
    timer.unref();
    return timer;
}
