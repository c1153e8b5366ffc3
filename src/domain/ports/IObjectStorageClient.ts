/**
 * IObjectStorageClient - Port for fetching generated assets from object storage.
 * Implementations: GcsStorageClient
 */
export interface IObjectStorageClient {
    /**
     * Downloads `scheme://bucket/key` to a local path.
     * @throws StorageError for malformed URIs or failed transfers
     */
    downloadToFile(uri: string, destinationPath: string): Promise<void>;
}
