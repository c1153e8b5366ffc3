import { VideoTask } from '../../domain/entities/VideoTask';
import {
    CropError,
    DecodeError,
    PipelineError,
    PollingError,
    RemoteGenerationError,
    StorageError,
    SubmissionError,
    errorMessage,
} from '../../domain/errors/PipelineErrors';
import { TaskStore } from '../TaskStore';

export class OrchestratorErrorService {
    constructor(private readonly taskStore: TaskStore) { }

    /**
     * Records a pipeline failure on the task and logs diagnostics for operators.
     * The causing message is kept on the task; the progress message is the friendly one.
     */
    handleTaskError(taskId: string, error: unknown): VideoTask {
        const message = errorMessage(error);
        console.error(`[${taskId}] Video generation failed:`, error);

        if (error instanceof PipelineError && error.details !== undefined) {
            console.error(`[${taskId}] ${error.name} details:`, error.details);
        }

        return this.taskStore.failTask(taskId, message, this.getFriendlyErrorMessage(error));
    }

    /**
     * Converts pipeline errors to user-facing messages.
     */
    getFriendlyErrorMessage(error: unknown): string {
        if (error instanceof DecodeError) {
            return 'The image could not be read. Please upload a PNG, JPEG or WebP image.';
        }
        if (error instanceof SubmissionError) {
            if (error.statusCode === 429) {
                return 'The video service is busy right now. Please try again in a few minutes.';
            }
            return 'The video generation request was rejected. Please try again with a different image.';
        }
        if (error instanceof PollingError) {
            return 'We lost track of the video generation job. Please try again.';
        }
        if (error instanceof RemoteGenerationError) {
            if (error.message.includes('safety filters')) {
                return 'The generated video was blocked by safety filters. Please try a different image.';
            }
            return 'The video service could not generate a video for this image.';
        }
        if (error instanceof StorageError) {
            return 'The generated video could not be stored. Please try again.';
        }
        if (error instanceof CropError) {
            return 'The generated video could not be cropped back to your image format.';
        }
        return 'Something went wrong. An unexpected error occurred. Please try again.';
    }
}
