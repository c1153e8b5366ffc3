import ffmpeg from 'fluent-ffmpeg';
import fs from 'fs';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { IVideoCropper } from '../../domain/ports/IVideoCropper';
import { computeCrop } from '../../domain/services/AspectRatioTransform';
import { CropError, errorMessage } from '../../domain/errors/PipelineErrors';

export interface VideoDimensions {
    width: number;
    height: number;
}

/**
 * Crops generated videos back to the source image's aspect ratio.
 * Requires 'ffmpeg' and 'ffprobe' to be installed in the system.
 */
export class FFmpegVideoCropper implements IVideoCropper {
    /**
     * @param outputDir where cropped files go; defaults to the input's directory
     */
    constructor(private readonly outputDir?: string) { }

    async crop(localVideoPath: string, originalAspectRatio: number): Promise<string> {
        const { width, height } = await this.readDimensions(localVideoPath);
        const outputPath = this.outputPathFor(localVideoPath);

        try {
            await fs.promises.mkdir(path.dirname(outputPath), { recursive: true });

            const plan = computeCrop(width, height, originalAspectRatio);
            if (plan.kind === 'identity') {
                // A copy, not the input path: callers may move or delete the input
                console.log(`[FFmpegCropper] ${width}x${height} already matches ${originalAspectRatio.toFixed(4)}, copying`);
                await fs.promises.copyFile(localVideoPath, outputPath);
                return outputPath;
            }

            // yuv420p needs even dimensions
            const cropWidth = plan.cropWidth - (plan.cropWidth % 2);
            const cropHeight = plan.cropHeight - (plan.cropHeight % 2);

            console.log(`[FFmpegCropper] Cropping ${width}x${height} to ${cropWidth}x${cropHeight} at (${plan.x},${plan.y})`);
            await this.runCrop(localVideoPath, outputPath, `crop=${cropWidth}:${cropHeight}:${plan.x}:${plan.y}`);
            return outputPath;
        } catch (error) {
            await fs.promises.rm(outputPath, { force: true }).catch((cleanupError: unknown) => {
                console.warn(`[FFmpegCropper] Failed to remove partial output ${outputPath}`, cleanupError);
            });
            if (error instanceof CropError) {
                throw error;
            }
            throw new CropError(`Failed to crop ${localVideoPath}: ${errorMessage(error)}`, error);
        }
    }

    /**
     * Reads the pixel size of the first video stream.
     */
    readDimensions(localVideoPath: string): Promise<VideoDimensions> {
        return new Promise((resolve, reject) => {
            ffmpeg.ffprobe(localVideoPath, (err: unknown, data: ffmpeg.FfprobeData) => {
                if (err) {
                    reject(new CropError(`Failed to read dimensions of ${localVideoPath}: ${errorMessage(err)}`, err));
                    return;
                }

                const stream = data.streams.find((s) => s.codec_type === 'video');
                if (!stream || !stream.width || !stream.height) {
                    reject(new CropError(`No video stream with dimensions in ${localVideoPath}`));
                    return;
                }
                resolve({ width: stream.width, height: stream.height });
            });
        });
    }

    private runCrop(inputPath: string, outputPath: string, cropFilter: string): Promise<void> {
        return new Promise((resolve, reject) => {
            ffmpeg(inputPath)
                .videoFilters(cropFilter)
                .videoCodec('libx264')
                .noAudio()
                .outputOptions(['-crf 18', '-preset medium', '-pix_fmt yuv420p', '-movflags +faststart'])
                .on('error', (err: Error) => reject(new CropError(`FFmpeg failed: ${err.message}`, err)))
                .on('end', () => resolve())
                .save(outputPath);
        });
    }

    private outputPathFor(inputPath: string): string {
        const { dir, name } = path.parse(inputPath);
        return path.join(this.outputDir ?? dir, `${name}_cropped_${uuidv4().substring(0, 8)}.mp4`);
    }
}
