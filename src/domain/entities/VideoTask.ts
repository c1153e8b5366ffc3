import { AspectRatioLabel } from './AspectRatio';
import { JobHandle, ModelVariantKey } from './GenerationJob';

/**
 * Stages of an image-to-video task, in pipeline order.
 * `failed` is reachable from every non-terminal stage.
 */
export type VideoTaskStage =
    | 'preparing'
    | 'submitted'
    | 'polling'
    | 'downloading'
    | 'cropping'
    | 'uploading'
    | 'complete'
    | 'failed';

const STAGE_ORDER: readonly VideoTaskStage[] = [
    'preparing',
    'submitted',
    'polling',
    'downloading',
    'cropping',
    'uploading',
    'complete',
];

export const STAGE_MESSAGES: Record<VideoTaskStage, string> = {
    preparing: 'Step 1/5: Preparing image for video generation...',
    submitted: 'Step 2/5: Generation job submitted...',
    polling: 'Step 2/5: Waiting for the video to be generated...',
    downloading: 'Step 3/5: Downloading generated video...',
    cropping: 'Step 4/5: Cropping video to original aspect ratio...',
    uploading: 'Step 5/5: Finalizing video...',
    complete: 'Video generation complete!',
    failed: 'Video generation failed.',
};

/**
 * Input for creating a task.
 */
export interface VideoTaskInput {
    /** Upload name without extension, used to name delivered files */
    sourceFileName: string;
    modelVariant: ModelVariantKey;
}

/**
 * What has to survive the asynchronous job boundary from the prepared image.
 * Set once; the cropper must reuse exactly this ratio.
 */
export interface PreparedImageMetadata {
    readonly originalAspectRatio: number;
    readonly originalWidth: number;
    readonly originalHeight: number;
    readonly targetAspectRatio: AspectRatioLabel;
    readonly preparedWidth: number;
    readonly preparedHeight: number;
}

export interface VideoTask {
    id: string;
    stage: VideoTaskStage;
    /** Human-readable progress */
    progressMessage: string;
    sourceFileName: string;
    modelVariant: ModelVariantKey;

    // Populated during processing:
    preparedImage?: PreparedImageMetadata;
    jobHandle?: JobHandle;
    prompt?: string;
    /** Remote location of the uncropped generated video */
    generatedVideoUri?: string;
    /** Retrievable location of the uncropped video, for comparison */
    generatedVideoUrl?: string;
    /** Retrievable location of the cropped video */
    finalVideoUrl?: string;
    error?: string;

    createdAt: Date;
    updatedAt: Date;
    completedAt?: Date;
}

export function createVideoTask(id: string, input: VideoTaskInput): VideoTask {
    if (!id.trim()) {
        throw new Error('VideoTask id cannot be empty');
    }
    if (!input.sourceFileName.trim()) {
        throw new Error('VideoTask requires a source file name');
    }

    const now = new Date();
    return {
        id: id.trim(),
        stage: 'preparing',
        progressMessage: STAGE_MESSAGES.preparing,
        sourceFileName: input.sourceFileName.trim(),
        modelVariant: input.modelVariant,
        createdAt: now,
        updatedAt: now,
    };
}

export function isTaskTerminal(task: VideoTask): boolean {
    return task.stage === 'complete' || task.stage === 'failed';
}

/**
 * Moves a task forward. Stages never go backwards and terminal tasks never move.
 */
export function advanceTaskStage(task: VideoTask, stage: VideoTaskStage, progressMessage?: string): VideoTask {
    if (isTaskTerminal(task)) {
        throw new Error(`Task ${task.id} is already ${task.stage}`);
    }
    if (stage === 'failed') {
        throw new Error('Use failTask to mark a task as failed');
    }
    if (STAGE_ORDER.indexOf(stage) <= STAGE_ORDER.indexOf(task.stage)) {
        throw new Error(`Task ${task.id} cannot move from ${task.stage} to ${stage}`);
    }

    return {
        ...task,
        stage,
        progressMessage: progressMessage ?? STAGE_MESSAGES[stage],
        updatedAt: new Date(),
    };
}

export function attachPreparedImage(task: VideoTask, preparedImage: PreparedImageMetadata): VideoTask {
    if (task.preparedImage) {
        throw new Error(`Task ${task.id} already has prepared image metadata`);
    }
    return {
        ...task,
        preparedImage: Object.freeze({ ...preparedImage }),
        updatedAt: new Date(),
    };
}

export function attachJobHandle(task: VideoTask, jobHandle: JobHandle, prompt: string): VideoTask {
    if (task.jobHandle) {
        throw new Error(`Task ${task.id} was already submitted as ${task.jobHandle.operationName}`);
    }
    return {
        ...task,
        jobHandle,
        prompt,
        updatedAt: new Date(),
    };
}

export function completeTask(
    task: VideoTask,
    result: { finalVideoUrl: string; generatedVideoUri: string; generatedVideoUrl: string }
): VideoTask {
    const completed = advanceTaskStage(task, 'complete');
    return {
        ...completed,
        finalVideoUrl: result.finalVideoUrl,
        generatedVideoUri: result.generatedVideoUri,
        generatedVideoUrl: result.generatedVideoUrl,
        completedAt: completed.updatedAt,
    };
}

/**
 * Marks a task as failed with the causing message. A failed task stays failed.
 */
export function failTask(task: VideoTask, error: string, progressMessage?: string): VideoTask {
    if (isTaskTerminal(task)) {
        throw new Error(`Task ${task.id} is already ${task.stage}`);
    }
    const now = new Date();
    return {
        ...task,
        stage: 'failed',
        progressMessage: progressMessage ?? STAGE_MESSAGES.failed,
        error,
        updatedAt: now,
        completedAt: now,
    };
}
