import { ProjectContext } from '../../domain/ports/IJobSubmitter';

/**
 * URL builder for publisher model methods on the regional Vertex AI endpoint.
 */
export class VertexEndpoints {
    private readonly baseUrl: string;

    constructor(private readonly project: ProjectContext, baseUrl?: string) {
        if (!project.projectId || !project.location) {
            throw new Error('Vertex AI requires a project id and a location');
        }
        const defaultBase = `https://${project.location}-aiplatform.googleapis.com/v1`;
        this.baseUrl = (baseUrl ?? defaultBase).replace(/\/+$/, '');
    }

    modelMethodUrl(modelId: string, method: string): string {
        const { projectId, location } = this.project;
        return `${this.baseUrl}/projects/${projectId}/locations/${location}/publishers/google/models/${modelId}:${method}`;
    }

    predictLongRunningUrl(modelId: string): string {
        return this.modelMethodUrl(modelId, 'predictLongRunning');
    }

    fetchPredictOperationUrl(modelId: string): string {
        return this.modelMethodUrl(modelId, 'fetchPredictOperation');
    }

    generateContentUrl(modelId: string): string {
        return this.modelMethodUrl(modelId, 'generateContent');
    }
}
