import fs from 'fs';
import path from 'path';
import {
    VideoTask,
    attachJobHandle,
    attachPreparedImage,
    completeTask,
} from '../domain/entities/VideoTask';
import {
    ModelVariantDefaults,
    extractVideoUris,
    resolveModelVariant,
} from '../domain/entities/GenerationJob';
import { IImagePreparer, PreparedImage } from '../domain/ports/IImagePreparer';
import { IJobSubmitter } from '../domain/ports/IJobSubmitter';
import { IOperationPoller } from '../domain/ports/IOperationPoller';
import { ICredentialProvider } from '../domain/ports/ICredentialProvider';
import { IObjectStorageClient } from '../domain/ports/IObjectStorageClient';
import { IVideoCropper } from '../domain/ports/IVideoCropper';
import { IDeliveryStorage } from '../domain/ports/IDeliveryStorage';
import { IPromptGenerator } from '../domain/ports/IPromptGenerator';
import { TaskStore } from './TaskStore';
import { OrchestratorErrorService } from './services/OrchestratorErrorService';

export interface OrchestratorDependencies {
    taskStore: TaskStore;
    imagePreparer: IImagePreparer;
    jobSubmitter: IJobSubmitter;
    operationPoller: IOperationPoller;
    credentialProvider: ICredentialProvider;
    objectStorage: IObjectStorageClient;
    videoCropper: IVideoCropper;
    deliveryStorage: IDeliveryStorage;
    promptGenerator?: IPromptGenerator; // Uses defaultPrompt when absent
    defaultPrompt: string;
    /** `gs://bucket[/path]` the generation API writes into */
    outputUriPrefix: string;
    /** Per-task scratch directories are created below this */
    workDir: string;
    variantSettings?: ModelVariantDefaults;
    now?: () => Date;
}

/**
 * PipelineOrchestrator turns an uploaded image into a delivered video
 * with the image's original aspect ratio.
 *
 * prepare -> submit -> poll -> download -> crop -> deliver
 */
export class PipelineOrchestrator {
    private readonly deps: OrchestratorDependencies;
    private readonly errorService: OrchestratorErrorService;

    constructor(deps: OrchestratorDependencies) {
        this.deps = deps;
        this.errorService = new OrchestratorErrorService(deps.taskStore);
    }

    /**
     * Runs the whole pipeline for a task created in the store.
     * Never rejects for pipeline failures: the task ends up `failed` with the cause attached.
     */
    async processTask(taskId: string, imageBytes: Buffer): Promise<VideoTask> {
        const { taskStore } = this.deps;
        const task = taskStore.requireTask(taskId);
        const taskDir = path.join(this.deps.workDir, taskId);

        console.log(`[${taskId}] Starting video generation for "${task.sourceFileName}" (${task.modelVariant})`);

        try {
            await fs.promises.mkdir(taskDir, { recursive: true });

            // 1. Pad to a supported aspect ratio
            const prepared = await this.deps.imagePreparer.prepare(imageBytes);
            taskStore.updateTask(taskId, (t) => attachPreparedImage(t, {
                originalAspectRatio: prepared.originalAspectRatio,
                originalWidth: prepared.originalWidth,
                originalHeight: prepared.originalHeight,
                targetAspectRatio: prepared.targetAspectRatio,
                preparedWidth: prepared.width,
                preparedHeight: prepared.height,
            }));
            console.log(
                `[${taskId}] Prepared ${prepared.originalWidth}x${prepared.originalHeight} -> ` +
                `${prepared.width}x${prepared.height} (${prepared.targetAspectRatio})`
            );

            // 2. Submit
            const prompt = await this.resolvePrompt(prepared);
            const variant = resolveModelVariant(task.modelVariant, prepared.targetAspectRatio, this.deps.variantSettings);
            const handle = await this.deps.jobSubmitter.submit({
                imageBytes: prepared.bytes,
                mimeType: prepared.mimeType,
                prompt,
                variant,
                outputUriPrefix: this.deps.outputUriPrefix,
            });
            taskStore.updateTask(taskId, (t) => attachJobHandle(t, handle, prompt));
            taskStore.advanceStage(taskId, 'submitted');
            console.log(`[${taskId}] Submitted ${handle.operationName} on ${handle.modelId}`);

            // 3. Wait for the remote job
            taskStore.advanceStage(taskId, 'polling');
            const result = await this.deps.operationPoller.poll(handle, this.deps.credentialProvider);
            const [generatedVideoUri] = extractVideoUris(result, handle.operationName);

            // 4. Download
            taskStore.advanceStage(taskId, 'downloading');
            const generatedPath = path.join(taskDir, 'generated.mp4');
            await this.deps.objectStorage.downloadToFile(generatedVideoUri, generatedPath);

            // 5. Restore the original aspect ratio from the stored value, not the video
            taskStore.advanceStage(taskId, 'cropping');
            const originalAspectRatio = this.storedAspectRatio(taskId);
            const croppedPath = await this.deps.videoCropper.crop(generatedPath, originalAspectRatio);

            // 6. Deliver the cropped video, then the uncropped one for comparison
            taskStore.advanceStage(taskId, 'uploading');
            const { sourceFileName } = taskStore.requireTask(taskId);
            const finalVideoUrl = await this.deps.deliveryStorage.deliver(
                croppedPath,
                this.outputFileName(taskId, sourceFileName, 'cropped')
            );
            const generatedVideoUrl = await this.deps.deliveryStorage.deliver(
                generatedPath,
                this.outputFileName(taskId, sourceFileName, prepared.targetAspectRatio.replace(':', 'x'))
            );

            const completed = taskStore.updateTask(taskId, (t) => completeTask(t, {
                finalVideoUrl,
                generatedVideoUri,
                generatedVideoUrl,
            }));
            console.log(`[${taskId}] Complete: ${finalVideoUrl}`);
            return completed;
        } catch (error) {
            return this.errorService.handleTaskError(taskId, error);
        } finally {
            await this.cleanup(taskId, taskDir);
        }
    }

    private async resolvePrompt(prepared: PreparedImage): Promise<string> {
        if (!this.deps.promptGenerator) {
            return this.deps.defaultPrompt;
        }
        return this.deps.promptGenerator.generatePrompt(prepared.bytes, prepared.mimeType);
    }

    private storedAspectRatio(taskId: string): number {
        const prepared = this.deps.taskStore.requireTask(taskId).preparedImage;
        if (!prepared) {
            throw new Error(`Task ${taskId} has no prepared image metadata`);
        }
        return prepared.originalAspectRatio;
    }

    /**
     * `<name>_<tag>_<ms>_<task id prefix>.mp4`; the task fragment keeps same-name
     * uploads finishing in the same millisecond apart.
     */
    private outputFileName(taskId: string, sourceFileName: string, tag: string): string {
        const baseName = path.parse(sourceFileName).name || 'video';
        const timestamp = (this.deps.now ?? (() => new Date()))().getTime();
        const taskFragment = taskId.replace(/^task_/, '').substring(0, 8);
        return `${baseName}_${tag}_${timestamp}_${taskFragment}.mp4`;
    }

    private async cleanup(taskId: string, taskDir: string): Promise<void> {
        try {
            await fs.promises.rm(taskDir, { recursive: true, force: true });
        } catch (error) {
            console.warn(`[${taskId}] Failed to remove work directory ${taskDir}:`, error);
        }
    }
}
