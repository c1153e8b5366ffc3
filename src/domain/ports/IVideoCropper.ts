/**
 * IVideoCropper - Port for restoring a generated video to the source aspect ratio.
 * Implementations: FFmpegVideoCropper
 */
export interface IVideoCropper {
    /**
     * Returns the path of a new file; never the input path.
     * @throws CropError when the video cannot be inspected or re-encoded
     */
    crop(localVideoPath: string, originalAspectRatio: number): Promise<string>;
}
