import { AspectRatioLabel } from './AspectRatio';
import { RemoteGenerationError } from '../errors/PipelineErrors';

/**
 * Generation models a request can target.
 */
export type ModelVariantKey = 'veo-3-fast' | 'veo-2';

export const MODEL_VARIANT_KEYS: readonly ModelVariantKey[] = ['veo-3-fast', 'veo-2'];

export type VideoResolution = '720p' | '1080p';

/**
 * Parameter shape each model requires. Exactly one per variant.
 */
export type GenerationParameters =
    | {
        readonly kind: 'resolution-audio';
        readonly resolution: VideoResolution;
        readonly generateAudio: boolean;
    }
    | {
        readonly kind: 'duration-aspect';
        readonly durationSeconds: number;
        readonly aspectRatio: AspectRatioLabel;
    };

export interface ModelVariant {
    readonly key: ModelVariantKey;
    readonly modelId: string;
    readonly parameters: GenerationParameters;
}

export interface ModelVariantDefaults {
    veo3Resolution: VideoResolution;
    veo2DurationSeconds: number;
}

export const DEFAULT_MODEL_VARIANT_SETTINGS: ModelVariantDefaults = {
    veo3Resolution: '720p',
    veo2DurationSeconds: 8,
};

export function isModelVariantKey(value: unknown): value is ModelVariantKey {
    return MODEL_VARIANT_KEYS.some((key) => key === value);
}

/**
 * Resolves a variant key into its model id and parameter set.
 * Audio is always disabled: the cropped output carries no audio track.
 */
export function resolveModelVariant(
    key: ModelVariantKey,
    targetAspectRatio: AspectRatioLabel,
    settings: ModelVariantDefaults = DEFAULT_MODEL_VARIANT_SETTINGS
): ModelVariant {
    switch (key) {
        case 'veo-3-fast':
            return {
                key,
                modelId: 'veo-3.0-fast-generate-001',
                parameters: {
                    kind: 'resolution-audio',
                    resolution: settings.veo3Resolution,
                    generateAudio: false,
                },
            };
        case 'veo-2':
            return {
                key,
                modelId: 'veo-2.0-generate-001',
                parameters: {
                    kind: 'duration-aspect',
                    durationSeconds: settings.veo2DurationSeconds,
                    aspectRatio: targetAspectRatio,
                },
            };
        default: {
            const unreachable: never = key;
            throw new Error(`Unsupported model variant: ${String(unreachable)}`);
        }
    }
}

/**
 * Serializes the variant parameters into the `parameters` block of a submit request.
 */
export function buildRequestParameters(
    parameters: GenerationParameters,
    storageUri: string
): Record<string, string | number | boolean> {
    const common = { storageUri, sampleCount: 1 };
    switch (parameters.kind) {
        case 'resolution-audio':
            return {
                resolution: parameters.resolution,
                generateAudio: parameters.generateAudio,
                ...common,
            };
        case 'duration-aspect':
            return {
                durationSeconds: parameters.durationSeconds,
                aspectRatio: parameters.aspectRatio,
                ...common,
            };
        default: {
            const unreachable: never = parameters;
            throw new Error(`Unsupported parameter set: ${JSON.stringify(unreachable)}`);
        }
    }
}

/**
 * Handle for a submitted long-running operation. The polling endpoint is
 * model specific, so the model id travels with the operation name.
 */
export interface JobHandle {
    readonly operationName: string;
    readonly modelId: string;
    /** Job-scoped output folder the remote side writes into */
    readonly storageUri: string;
}

export interface OperationError {
    code?: number;
    message?: string;
}

export interface GeneratedVideo {
    gcsUri?: string;
    mimeType?: string;
}

export interface OperationStatus {
    name?: string;
    done?: boolean;
    error?: OperationError;
    response?: {
        videos?: GeneratedVideo[];
        raiMediaFilteredCount?: number;
        raiMediaFilteredReasons?: string[];
    };
    metadata?: unknown;
}

/**
 * Terminal operation status as returned by the remote side.
 */
export interface OperationResult extends OperationStatus {
    done: true;
}

export function isOperationStatus(value: unknown): value is OperationStatus {
    if (typeof value !== 'object' || value === null || Array.isArray(value)) {
        return false;
    }
    const done: unknown = Reflect.get(value, 'done');
    return done === undefined || typeof done === 'boolean';
}

export function isOperationResult(status: OperationStatus): status is OperationResult {
    return status.done === true;
}

/**
 * Reads the output locations from a finished operation.
 * Error payloads and empty responses become RemoteGenerationError.
 */
export function extractVideoUris(result: OperationResult, operationName?: string): string[] {
    if (result.error) {
        const message = result.error.message || 'Unknown error';
        throw new RemoteGenerationError(`Video generation failed: ${message}`, operationName, result.error);
    }

    const uris = (result.response?.videos ?? [])
        .map((video) => video.gcsUri)
        .filter((uri): uri is string => typeof uri === 'string' && uri.length > 0);

    if (uris.length === 0) {
        const filtered = result.response?.raiMediaFilteredCount;
        const reason = filtered ? ` (${filtered} output(s) removed by safety filters)` : '';
        throw new RemoteGenerationError(
            `Video generation completed but returned no video${reason}`,
            operationName,
            result
        );
    }

    return uris;
}
