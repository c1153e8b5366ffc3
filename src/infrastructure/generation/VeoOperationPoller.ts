import axios from 'axios';
import { IOperationPoller } from '../../domain/ports/IOperationPoller';
import { ICredentialProvider } from '../../domain/ports/ICredentialProvider';
import {
    JobHandle,
    OperationResult,
    OperationStatus,
    isOperationStatus,
    isOperationResult,
} from '../../domain/entities/GenerationJob';
import { PollingError, errorMessage } from '../../domain/errors/PipelineErrors';
import { VertexEndpoints } from './VertexEndpoints';

/**
 * Body key carrying the operation name in `fetchPredictOperation` requests.
 * The v1 contract uses `name`; `operationName` is accepted by older revisions.
 */
export type PollRequestKey = 'name' | 'operationName';

export interface OperationPollerOptions {
    /** Wait between status checks (default 20s) */
    pollIntervalMs?: number;
    /** Gives up after this many checks; 0 or unset polls until done */
    maxAttempts?: number;
    requestKey?: PollRequestKey;
    sleep?: (ms: number) => Promise<void>;
}

const DEFAULT_POLL_INTERVAL_MS = 20_000;

function defaultSleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Polls `fetchPredictOperation` until the remote side reports `done`.
 * No backoff and no retry on transport errors: a failed check aborts the wait.
 */
export class VeoOperationPoller implements IOperationPoller {
    private readonly pollIntervalMs: number;
    private readonly maxAttempts: number;
    private readonly requestKey: PollRequestKey;
    private readonly sleep: (ms: number) => Promise<void>;

    constructor(private readonly endpoints: VertexEndpoints, options: OperationPollerOptions = {}) {
        this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
        this.maxAttempts = options.maxAttempts ?? 0;
        this.requestKey = options.requestKey ?? 'name';
        this.sleep = options.sleep ?? defaultSleep;
    }

    async poll(handle: JobHandle, credentialProvider: ICredentialProvider): Promise<OperationResult> {
        const endpoint = this.endpoints.fetchPredictOperationUrl(handle.modelId);
        const body = { [this.requestKey]: handle.operationName };

        for (let attempt = 1; ; attempt++) {
            // Tokens can expire during long jobs, so refresh on every check
            let token: string;
            try {
                token = await credentialProvider.getAccessToken();
            } catch (error) {
                throw new PollingError(`Failed to refresh credentials: ${errorMessage(error)}`);
            }

            const status = await this.fetchStatus(endpoint, body, token, handle.operationName);
            if (isOperationResult(status)) {
                console.log(`[VeoPoller] Operation ${handle.operationName} finished after ${attempt} check(s)`);
                return status;
            }

            if (this.maxAttempts > 0 && attempt >= this.maxAttempts) {
                throw new PollingError(
                    `Operation ${handle.operationName} not done after ${attempt} checks ` +
                    `(${(attempt * this.pollIntervalMs) / 1000}s)`
                );
            }

            if (attempt % 3 === 0) {
                console.log(`[VeoPoller] Operation ${handle.operationName} still running (check ${attempt})...`);
            }
            await this.sleep(this.pollIntervalMs);
        }
    }

    private async fetchStatus(
        endpoint: string,
        body: Record<string, string>,
        token: string,
        operationName: string
    ): Promise<OperationStatus> {
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
                throw new PollingError(
                    `Status check for ${operationName} failed: ${error.message}`,
                    error.response?.status,
                    error.response?.data
                );
            }
            throw new PollingError(`Status check for ${operationName} failed: ${errorMessage(error)}`);
        }

        if (!isOperationStatus(data)) {
            throw new PollingError(`Malformed status response for ${operationName}`, undefined, data);
        }
        return data;
    }
}
