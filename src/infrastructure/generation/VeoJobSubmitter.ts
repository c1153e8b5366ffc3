import axios from 'axios';
import { v4 as uuidv4 } from 'uuid';
import { IJobSubmitter, SubmitJobRequest } from '../../domain/ports/IJobSubmitter';
import { ICredentialProvider } from '../../domain/ports/ICredentialProvider';
import { JobHandle, buildRequestParameters } from '../../domain/entities/GenerationJob';
import { SubmissionError, errorMessage } from '../../domain/errors/PipelineErrors';
import { parseObjectUri, jobOutputUri } from '../storage/ObjectUri';
import { VertexEndpoints } from './VertexEndpoints';

/**
 * Starts image-to-video jobs through `predictLongRunning`.
 */
export class VeoJobSubmitter implements IJobSubmitter {
    constructor(
        private readonly endpoints: VertexEndpoints,
        private readonly credentialProvider: ICredentialProvider,
        private readonly createJobId: () => string = () => uuidv4()
    ) { }

    async submit(request: SubmitJobRequest): Promise<JobHandle> {
        // Validates the prefix before anything leaves the process
        parseObjectUri(request.outputUriPrefix);
        const storageUri = jobOutputUri(request.outputUriPrefix, this.createJobId());

        const { variant } = request;
        const endpoint = this.endpoints.predictLongRunningUrl(variant.modelId);
        const body = {
            instances: [
                {
                    prompt: request.prompt,
                    image: {
                        bytesBase64Encoded: request.imageBytes.toString('base64'),
                        mimeType: request.mimeType,
                    },
                },
            ],
            parameters: buildRequestParameters(variant.parameters, storageUri),
        };

        let token: string;
        try {
            token = await this.credentialProvider.getAccessToken();
        } catch (error) {
            throw new SubmissionError(`Failed to obtain credentials: ${errorMessage(error)}`);
        }

        let data: unknown;
        try {
            const response = await axios.post(endpoint, body, {
                headers: {
                    'Authorization': `Bearer ${token}`,
                    'Content-Type': 'application/json',
                },
            });
            data = response.data;
        } catch (error) {
            if (axios.isAxiosError(error)) {
                const responseBody: unknown = error.response?.data;
                console.error(`[VeoSubmitter] ${variant.modelId} rejected the job:`, JSON.stringify(responseBody));
                throw new SubmissionError(
                    `Failed to start video generation (${variant.modelId}): ${error.message}`,
                    error.response?.status,
                    responseBody
                );
            }
            throw new SubmissionError(`Failed to start video generation (${variant.modelId}): ${errorMessage(error)}`);
        }

        const operationName = readOperationName(data);
        if (!operationName) {
            throw new SubmissionError('Generation API did not return an operation name', undefined, data);
        }

        console.log(`[VeoSubmitter] Started operation ${operationName} (output: ${storageUri})`);
        return { operationName, modelId: variant.modelId, storageUri };
    }
}

function readOperationName(data: unknown): string | undefined {
    if (typeof data !== 'object' || data === null) {
        return undefined;
    }
    const name: unknown = Reflect.get(data, 'name');
    return typeof name === 'string' && name.length > 0 ? name : undefined;
}
