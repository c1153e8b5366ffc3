/**
 * Base class for failures raised by the image-to-video pipeline components.
 * `details` keeps the underlying error or payload for operator logs.
 */
export class PipelineError extends Error {
    constructor(message: string, public readonly details?: unknown) {
        super(message);
        this.name = 'PipelineError';
    }
}

/**
 * Input image could not be decoded or has no usable dimensions.
 */
export class DecodeError extends PipelineError {
    constructor(message: string, details?: unknown) {
        super(message, details);
        this.name = 'DecodeError';
    }
}

/**
 * Creating the generation job failed (transport error or remote validation).
 */
export class SubmissionError extends PipelineError {
    constructor(
        message: string,
        public readonly statusCode?: number,
        public readonly responseBody?: unknown
    ) {
        super(message, responseBody);
        this.name = 'SubmissionError';
    }
}

/**
 * A status check on a running job failed at the transport level.
 */
export class PollingError extends PipelineError {
    constructor(
        message: string,
        public readonly statusCode?: number,
        public readonly responseBody?: unknown
    ) {
        super(message, responseBody);
        this.name = 'PollingError';
    }
}

/**
 * The remote job finished in an error state, or finished without output.
 */
export class RemoteGenerationError extends PipelineError {
    constructor(message: string, public readonly operationName?: string, details?: unknown) {
        super(message, details);
        this.name = 'RemoteGenerationError';
    }
}

/**
 * Upload or download failed, including malformed object URIs.
 */
export class StorageError extends PipelineError {
    constructor(message: string, public readonly uri?: string, details?: unknown) {
        super(message, details);
        this.name = 'StorageError';
    }
}

/**
 * The generated video could not be inspected, cropped or re-encoded.
 */
export class CropError extends PipelineError {
    constructor(message: string, details?: unknown) {
        super(message, details);
        this.name = 'CropError';
    }
}

/**
 * No task is registered under the requested identifier.
 */
export class TaskNotFoundError extends Error {
    constructor(public readonly taskId: string) {
        super(`Task not found: ${taskId}`);
        this.name = 'TaskNotFoundError';
    }
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
