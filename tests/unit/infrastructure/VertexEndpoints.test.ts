import { VertexEndpoints } from '../../../src/infrastructure/generation/VertexEndpoints';

describe('VertexEndpoints', () => {
    const project = { projectId: 'test-project', location: 'europe-west4' };

    it('should address the regional endpoint', () => {
        expect(new VertexEndpoints(project).predictLongRunningUrl('veo-2.0-generate-001')).toBe(
            'https://europe-west4-aiplatform.googleapis.com/v1/projects/test-project/locations/europe-west4/publishers/google/models/veo-2.0-generate-001:predictLongRunning'
        );
    });

    it('should build the poll and prompt URLs on the same model path', () => {
        const endpoints = new VertexEndpoints(project, 'http://localhost:9000/v1/');

        expect(endpoints.fetchPredictOperationUrl('m')).toBe(
            'http://localhost:9000/v1/projects/test-project/locations/europe-west4/publishers/google/models/m:fetchPredictOperation'
        );
        expect(endpoints.generateContentUrl('g')).toBe(
            'http://localhost:9000/v1/projects/test-project/locations/europe-west4/publishers/google/models/g:generateContent'
        );
    });

    it('should require a project and a location', () => {
        expect(() => new VertexEndpoints({ projectId: '', location: 'us-central1' }))
            .toThrow('Vertex AI requires a project id and a location');
        expect(() => new VertexEndpoints({ projectId: 'p', location: '' }))
            .toThrow('Vertex AI requires a project id and a location');
    });
});
