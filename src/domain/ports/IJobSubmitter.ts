import { JobHandle, ModelVariant } from '../entities/GenerationJob';

/**
 * Project and region the generation API is addressed under.
 */
export interface ProjectContext {
    projectId: string;
    location: string;
}

export interface SubmitJobRequest {
    imageBytes: Buffer;
    mimeType: string;
    prompt: string;
    variant: ModelVariant;
    /** `gs://bucket[/path]`; each job gets its own sub-folder below it */
    outputUriPrefix: string;
}

/**
 * IJobSubmitter - Port for starting a long-running video generation job.
 * Implementations: VeoJobSubmitter
 */
export interface IJobSubmitter {
    /**
     * @throws StorageError when the output prefix is malformed (before any request)
     * @throws SubmissionError when the remote side rejects the request
     */
    submit(request: SubmitJobRequest): Promise<JobHandle>;
}
