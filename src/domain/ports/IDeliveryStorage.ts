/**
 * IDeliveryStorage - Port for publishing the final video.
 * Implementations: LocalResultsStorage, GcsStorageClient, MediaStorageClient
 */
export interface IDeliveryStorage {
    /**
     * Publishes a local file under `fileName` and returns a retrievable location.
     * The local file may be moved or removed.
     */
    deliver(localPath: string, fileName: string): Promise<string>;
}
