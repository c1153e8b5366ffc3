import sharp from 'sharp';
import { IImagePreparer, PreparedImage } from '../../domain/ports/IImagePreparer';
import { AspectRatioSpec, selectAspectRatioSpec } from '../../domain/entities/AspectRatio';
import { computePadding, PADDING_FILL } from '../../domain/services/AspectRatioTransform';
import { DecodeError, errorMessage } from '../../domain/errors/PipelineErrors';

/**
 * Pads user images to the closest supported aspect ratio with the fuchsia
 * fill, then upscales to the model's minimum resolution when needed.
 * Output is always PNG so the padding edges survive untouched.
 */
export class SharpImagePreparer implements IImagePreparer {
    async prepare(imageBytes: Buffer): Promise<PreparedImage> {
        const { width, height } = await this.readDimensions(imageBytes);

        const originalAspectRatio = width / height;
        const spec = selectAspectRatioSpec(originalAspectRatio);
        const padding = computePadding(width, height, spec.ratio);

        try {
            // extend() fills in the input's own bands, so greyscale must become RGB first
            const rgb = await sharp(imageBytes, { failOn: 'none' })
                .removeAlpha()
                .toColourspace('srgb')
                .png()
                .toBuffer();

            let pipeline = sharp(rgb);
            if (padding.kind === 'pad') {
                pipeline = pipeline.extend({
                    top: padding.yOffset,
                    bottom: padding.newHeight - height - padding.yOffset,
                    left: padding.xOffset,
                    right: padding.newWidth - width - padding.xOffset,
                    background: { ...PADDING_FILL, alpha: 1 },
                });
            }

            const padded = await pipeline.png().toBuffer({ resolveWithObject: true });
            let output = padded;
            let upscaled = false;

            if (this.isBelowFloor(padded.info.width, padded.info.height, spec)) {
                // Replaces the padded image; it is not padded a second time
                output = await sharp(padded.data)
                    .resize(spec.minWidth, spec.minHeight, { fit: 'fill', kernel: sharp.kernel.lanczos3 })
                    .png()
                    .toBuffer({ resolveWithObject: true });
                upscaled = true;
            }

            console.log(
                `[ImagePreparer] ${width}x${height} (${originalAspectRatio.toFixed(4)}) -> ` +
                `${output.info.width}x${output.info.height} for ${spec.label}` +
                `${padding.kind === 'pad' ? ', padded' : ''}${upscaled ? ', upscaled' : ''}`
            );

            return {
                bytes: output.data,
                mimeType: 'image/png',
                width: output.info.width,
                height: output.info.height,
                originalWidth: width,
                originalHeight: height,
                originalAspectRatio,
                targetAspectRatio: spec.label,
                padded: padding.kind === 'pad',
                upscaled,
            };
        } catch (error) {
            throw new DecodeError(`Failed to prepare image: ${errorMessage(error)}`, error);
        }
    }

    private async readDimensions(imageBytes: Buffer): Promise<{ width: number; height: number }> {
        if (imageBytes.length === 0) {
            throw new DecodeError('Image is empty');
        }

        let metadata: sharp.Metadata;
        try {
            metadata = await sharp(imageBytes, { failOn: 'none' }).metadata();
        } catch (error) {
            throw new DecodeError(`Unsupported or malformed image: ${errorMessage(error)}`, error);
        }

        if (!metadata.width || !metadata.height) {
            throw new DecodeError('Could not read image dimensions');
        }
        return { width: metadata.width, height: metadata.height };
    }

    private isBelowFloor(width: number, height: number, spec: AspectRatioSpec): boolean {
        return width < spec.minWidth || height < spec.minHeight;
    }
}
