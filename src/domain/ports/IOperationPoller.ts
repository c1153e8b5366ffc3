import { JobHandle, OperationResult } from '../entities/GenerationJob';
import { ICredentialProvider } from './ICredentialProvider';

/**
 * IOperationPoller - Port for waiting on a long-running operation.
 * Implementations: VeoOperationPoller
 */
export interface IOperationPoller {
    /**
     * Resolves with the first terminal status, uninterpreted.
     * @throws PollingError on any transport failure
     */
    poll(handle: JobHandle, credentialProvider: ICredentialProvider): Promise<OperationResult>;
}
