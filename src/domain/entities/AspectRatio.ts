/**
 * Aspect ratio labels the generation model accepts.
 */
export type AspectRatioLabel = '16:9' | '9:16';

/**
 * A supported target ratio plus the minimum resolution the model expects.
 */
export interface AspectRatioSpec {
    readonly label: AspectRatioLabel;
    /** width / height */
    readonly ratio: number;
    readonly minWidth: number;
    readonly minHeight: number;
}

export const LANDSCAPE_16_9: AspectRatioSpec = Object.freeze({
    label: '16:9',
    ratio: 16 / 9,
    minWidth: 1280,
    minHeight: 720,
});

export const PORTRAIT_9_16: AspectRatioSpec = Object.freeze({
    label: '9:16',
    ratio: 9 / 16,
    minWidth: 720,
    minHeight: 1280,
});

export const ASPECT_RATIO_SPECS: Record<AspectRatioLabel, AspectRatioSpec> = {
    '16:9': LANDSCAPE_16_9,
    '9:16': PORTRAIT_9_16,
};

/** Two ratios closer than this are treated as equal. */
export const ASPECT_RATIO_TOLERANCE = 1e-5;

export function isAspectRatioLabel(value: unknown): value is AspectRatioLabel {
    return value === '16:9' || value === '9:16';
}

export function ratiosMatch(a: number, b: number): boolean {
    return Math.abs(a - b) < ASPECT_RATIO_TOLERANCE;
}

/**
 * Picks the supported spec numerically closest to the given ratio.
 * 16:9 wins unless 9:16 is strictly closer.
 */
export function selectAspectRatioSpec(aspectRatio: number): AspectRatioSpec {
    if (!Number.isFinite(aspectRatio) || aspectRatio <= 0) {
        throw new Error(`Aspect ratio must be a positive number, got: ${aspectRatio}`);
    }

    const landscapeDistance = Math.abs(aspectRatio - LANDSCAPE_16_9.ratio);
    const portraitDistance = Math.abs(aspectRatio - PORTRAIT_9_16.ratio);

    return portraitDistance < landscapeDistance ? PORTRAIT_9_16 : LANDSCAPE_16_9;
}
