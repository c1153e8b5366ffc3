import fs from 'fs';
import path from 'path';
import { IDeliveryStorage } from '../../domain/ports/IDeliveryStorage';
import { StorageError, errorMessage } from '../../domain/errors/PipelineErrors';

/**
 * Keeps final videos on local disk, served by the app under `publicPath`.
 */
export class LocalResultsStorage implements IDeliveryStorage {
    private readonly resultsDir: string;
    private readonly publicPath: string;

    constructor(resultsDir: string, publicPath: string = '/videos') {
        this.resultsDir = path.resolve(resultsDir);
        this.publicPath = publicPath.replace(/\/+$/, '');
    }

    getResultsDir(): string {
        return this.resultsDir;
    }

    async deliver(localPath: string, fileName: string): Promise<string> {
        const safeName = path.basename(fileName);
        const destination = path.join(this.resultsDir, safeName);

        try {
            await fs.promises.mkdir(this.resultsDir, { recursive: true });
            await this.move(localPath, destination);
        } catch (error) {
            throw new StorageError(`Failed to store ${safeName}: ${errorMessage(error)}`, destination, error);
        }

        console.log(`[LocalResults] Saved ${destination}`);
        return `${this.publicPath}/${encodeURIComponent(safeName)}`;
    }

    private async move(source: string, destination: string): Promise<void> {
        try {
            await fs.promises.rename(source, destination);
        } catch (error) {
            // rename cannot cross filesystems (temp dir on tmpfs)
            if (error instanceof Error && 'code' in error && error.code === 'EXDEV') {
                await fs.promises.copyFile(source, destination);
                await fs.promises.rm(source, { force: true });
                return;
            }
            throw error;
        }
    }
}
