import { AspectRatioLabel } from '../entities/AspectRatio';

/**
 * Image padded (and possibly upscaled) to a supported aspect ratio.
 */
export interface PreparedImage {
    /** Lossless PNG bytes */
    bytes: Buffer;
    mimeType: 'image/png';
    width: number;
    height: number;
    originalWidth: number;
    originalHeight: number;
    /** width / height of the source before any transform */
    originalAspectRatio: number;
    targetAspectRatio: AspectRatioLabel;
    padded: boolean;
    upscaled: boolean;
}

/**
 * IImagePreparer - Port for normalizing user images before generation.
 * Implementations: SharpImagePreparer
 */
export interface IImagePreparer {
    /**
     * @throws DecodeError when the bytes are not a readable image
     */
    prepare(imageBytes: Buffer): Promise<PreparedImage>;
}
