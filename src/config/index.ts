import dotenv from 'dotenv';
import os from 'os';
import path from 'path';
import {
    ModelVariantKey,
    MODEL_VARIANT_KEYS,
    VideoResolution,
} from '../domain/entities/GenerationJob';
import { FALLBACK_VIDEO_PROMPT } from '../infrastructure/llm/Prompts';

// Load environment variables
dotenv.config();

export type DeliveryStorageKind = 'local' | 'gcs' | 'cloudinary';
export type PollRequestKeyOption = 'name' | 'operationName';

/**
 * Application configuration loaded from environment variables.
 */
export interface Config {
    // Server
    port: number;
    environment: string;
    maxUploadMb: number;

    // Google Cloud
    gcpProjectId: string;
    gcpRegion: string;
    gcsBucket: string;
    outputUriPrefix: string;

    // Video generation
    videoModelVariant: ModelVariantKey;
    veo2DurationSeconds: number;
    veo3Resolution: VideoResolution;
    pollIntervalMs: number;
    pollMaxAttempts: number; // 0 = poll until done
    pollRequestKey: PollRequestKeyOption;

    // Prompt model
    promptGenerationEnabled: boolean;
    promptModel: string;
    defaultVideoPrompt: string;

    // Delivery
    deliveryStorage: DeliveryStorageKind;
    resultsDir: string;
    workDir: string;

    // Cloudinary (file storage)
    cloudinaryCloudName: string;
    cloudinaryApiKey: string;
    cloudinaryApiSecret: string;

    // Tasks
    taskRetentionMinutes: number;
}

function getEnvVar(key: string, defaultValue?: string): string {
    let value = process.env[key];
    if (value === undefined) {
        if (defaultValue !== undefined) {
            return defaultValue;
        }
        throw new Error(`Missing required environment variable: ${key}`);
    }

    // Proactive cleanup: trim whitespace and remove wrapping quotes
    value = value.trim();
    if (value.startsWith('"') && value.endsWith('"')) {
        value = value.substring(1, value.length - 1);
    } else if (value.startsWith("'") && value.endsWith("'")) {
        value = value.substring(1, value.length - 1);
    }

    return value;
}

function getEnvVarNumber(key: string, defaultValue?: number): number {
    const value = getEnvVar(key, defaultValue?.toString());
    const parsed = parseFloat(value);
    if (isNaN(parsed)) {
        throw new Error(`Environment variable ${key} must be a number, got: ${value}`);
    }
    return parsed;
}

function getEnvVarBoolean(key: string, defaultValue?: boolean): boolean {
    const value = getEnvVar(key, defaultValue?.toString()).toLowerCase();
    if (value === 'true' || value === '1') {
        return true;
    }
    if (value === 'false' || value === '0') {
        return false;
    }
    throw new Error(`Environment variable ${key} must be true or false, got: ${value}`);
}

function getEnvVarChoice<T extends string>(key: string, choices: readonly T[], defaultValue: T): T {
    const value = getEnvVar(key, defaultValue);
    const match = choices.find((choice) => choice === value);
    if (match === undefined) {
        throw new Error(`Environment variable ${key} must be one of ${choices.join(', ')}, got: ${value}`);
    }
    return match;
}

/**
 * Loads configuration from environment variables.
 */
export function loadConfig(): Config {
    const gcsBucket = getEnvVar('GCS_BUCKET', '');

    return {
        // Server
        port: getEnvVarNumber('PORT', 3000),
        environment: getEnvVar('NODE_ENV', 'development'),
        maxUploadMb: getEnvVarNumber('MAX_UPLOAD_MB', 20),

        // Google Cloud
        gcpProjectId: getEnvVar('GCP_PROJECT_ID', ''),
        gcpRegion: getEnvVar('GCP_REGION', 'us-central1'),
        gcsBucket,
        outputUriPrefix: getEnvVar('OUTPUT_URI_PREFIX', gcsBucket ? `gs://${gcsBucket}` : ''),

        // Video generation
        videoModelVariant: getEnvVarChoice('VIDEO_MODEL_VARIANT', MODEL_VARIANT_KEYS, 'veo-3-fast'),
        veo2DurationSeconds: getEnvVarNumber('VEO2_DURATION_SECONDS', 8),
        veo3Resolution: getEnvVarChoice<VideoResolution>('VEO3_RESOLUTION', ['720p', '1080p'], '720p'),
        pollIntervalMs: getEnvVarNumber('POLL_INTERVAL_MS', 20000),
        pollMaxAttempts: getEnvVarNumber('POLL_MAX_ATTEMPTS', 0),
        pollRequestKey: getEnvVarChoice<PollRequestKeyOption>('POLL_REQUEST_KEY', ['name', 'operationName'], 'name'),

        // Prompt model
        promptGenerationEnabled: getEnvVarBoolean('PROMPT_GENERATION_ENABLED', true),
        promptModel: getEnvVar('PROMPT_MODEL', 'gemini-2.5-flash'),
        defaultVideoPrompt: getEnvVar('DEFAULT_VIDEO_PROMPT', FALLBACK_VIDEO_PROMPT),

        // Delivery
        deliveryStorage: getEnvVarChoice<DeliveryStorageKind>('DELIVERY_STORAGE', ['local', 'gcs', 'cloudinary'], 'local'),
        resultsDir: getEnvVar('RESULTS_DIR', './results'),
        workDir: getEnvVar('WORK_DIR', path.join(os.tmpdir(), 'video-reframer')),

        // Cloudinary
        cloudinaryCloudName: getEnvVar('CLOUDINARY_CLOUD_NAME', ''),
        cloudinaryApiKey: getEnvVar('CLOUDINARY_API_KEY', ''),
        cloudinaryApiSecret: getEnvVar('CLOUDINARY_API_SECRET', ''),

        // Tasks
        taskRetentionMinutes: getEnvVarNumber('TASK_RETENTION_MINUTES', 60),
    };
}

/**
 * Validates that required configuration is present.
 */
export function validateConfig(config: Config): string[] {
    const errors: string[] = [];

    if (!config.gcpProjectId) {
        errors.push('GCP_PROJECT_ID is required for the video generation API');
    }
    if (!config.gcsBucket) {
        errors.push('GCS_BUCKET is required for generated video output');
    }
    if (config.outputUriPrefix && !config.outputUriPrefix.startsWith('gs://')) {
        errors.push(`OUTPUT_URI_PREFIX must start with gs:// (got "${config.outputUriPrefix}")`);
    }
    if (config.pollIntervalMs <= 0) {
        errors.push('POLL_INTERVAL_MS must be positive');
    }
    if (config.pollMaxAttempts < 0) {
        errors.push('POLL_MAX_ATTEMPTS must be 0 (unbounded) or positive');
    }

    if (config.deliveryStorage === 'cloudinary') {
        if (!config.cloudinaryCloudName || !config.cloudinaryApiKey || !config.cloudinaryApiSecret) {
            errors.push('Cloudinary credentials are required when DELIVERY_STORAGE is "cloudinary"');
        }
    }

    return errors;
}

let cachedConfig: Config | null = null;

export function getConfig(): Config {
    if (!cachedConfig) {
        cachedConfig = loadConfig();
    }
    return cachedConfig;
}

export function resetConfig(): void {
    cachedConfig = null;
}
