import { ratiosMatch } from '../entities/AspectRatio';

/**
 * Letterbox / pillarbox geometry shared by image preparation and video cropping.
 * Pure functions, no I/O.
 */

/** Fill used for synthetic padding. Downstream prompts and consumers rely on this exact color. */
export const PADDING_FILL = Object.freeze({ r: 255, g: 0, b: 255 });

export type PaddingPlan =
    | { readonly kind: 'identity' }
    | {
        readonly kind: 'pad';
        readonly newWidth: number;
        readonly newHeight: number;
        readonly xOffset: number;
        readonly yOffset: number;
    };

export type CropPlan =
    | { readonly kind: 'identity' }
    | {
        readonly kind: 'crop';
        readonly cropWidth: number;
        readonly cropHeight: number;
        readonly x: number;
        readonly y: number;
    };

// Absorbs binary floating point noise in products like height * (4 / 3).
const FLOOR_EPSILON = 1e-9;

function floorDimension(value: number): number {
    return Math.floor(value + FLOOR_EPSILON);
}

function assertDimensions(width: number, height: number, targetRatio: number): void {
    if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
        throw new Error(`Dimensions must be positive integers, got ${width}x${height}`);
    }
    if (!Number.isFinite(targetRatio) || targetRatio <= 0) {
        throw new Error(`Target ratio must be a positive number, got: ${targetRatio}`);
    }
}

/**
 * Computes the smallest canvas with `targetRatio` that contains a width x height
 * source, with the source centered. The canvas only ever grows.
 */
export function computePadding(width: number, height: number, targetRatio: number): PaddingPlan {
    assertDimensions(width, height, targetRatio);
    const ratio = width / height;

    if (ratiosMatch(ratio, targetRatio)) {
        return { kind: 'identity' };
    }

    if (ratio > targetRatio) {
        // Wider than target: bars top and bottom
        const newHeight = floorDimension(width / targetRatio);
        return {
            kind: 'pad',
            newWidth: width,
            newHeight,
            xOffset: 0,
            yOffset: Math.floor((newHeight - height) / 2),
        };
    }

    // Taller than target: bars left and right
    const newWidth = floorDimension(height * targetRatio);
    return {
        kind: 'pad',
        newWidth,
        newHeight: height,
        xOffset: Math.floor((newWidth - width) / 2),
        yOffset: 0,
    };
}

/**
 * Inverse of computePadding: the centered window of `targetRatio` inside a
 * width x height frame. `targetRatio` must be the ratio captured before padding.
 */
export function computeCrop(width: number, height: number, targetRatio: number): CropPlan {
    assertDimensions(width, height, targetRatio);
    const ratio = width / height;

    if (ratiosMatch(ratio, targetRatio)) {
        return { kind: 'identity' };
    }

    if (targetRatio > ratio) {
        // Target is wider than the frame: trim top and bottom
        const cropHeight = floorDimension(width / targetRatio);
        return {
            kind: 'crop',
            cropWidth: width,
            cropHeight,
            x: 0,
            y: Math.floor((height - cropHeight) / 2),
        };
    }

    // Target is narrower than the frame: trim the sides
    const cropWidth = floorDimension(height * targetRatio);
    return {
        kind: 'crop',
        cropWidth,
        cropHeight: height,
        x: Math.floor((width - cropWidth) / 2),
        y: 0,
    };
}
