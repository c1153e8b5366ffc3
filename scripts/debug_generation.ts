/**
 * Runs one image through prepare -> submit -> poll -> download against the real services.
 *
 * Usage (after `npm run build`): node dist/scripts/debug_generation.js <image> [veo-3-fast|veo-2]
 */
import fs from 'fs';
import path from 'path';
import { getConfig } from '../src/config';
import { SharpImagePreparer } from '../src/infrastructure/images/SharpImagePreparer';
import { GoogleCredentialProvider } from '../src/infrastructure/auth/GoogleCredentialProvider';
import { VertexEndpoints } from '../src/infrastructure/generation/VertexEndpoints';
import { VeoJobSubmitter } from '../src/infrastructure/generation/VeoJobSubmitter';
import { VeoOperationPoller } from '../src/infrastructure/generation/VeoOperationPoller';
import { GcsStorageClient } from '../src/infrastructure/storage/GcsStorageClient';
import { FALLBACK_VIDEO_PROMPT } from '../src/infrastructure/llm/Prompts';
import { extractVideoUris, isModelVariantKey, resolveModelVariant } from '../src/domain/entities/GenerationJob';
import { PipelineError } from '../src/domain/errors/PipelineErrors';

async function debugGeneration() {
    const [imagePath, variantArg = 'veo-3-fast'] = process.argv.slice(2);
    if (!imagePath) {
        console.error('Usage: debug_generation.ts <image> [veo-3-fast|veo-2]');
        process.exit(1);
    }
    if (!isModelVariantKey(variantArg)) {
        console.error(`Unknown model variant: ${variantArg}`);
        process.exit(1);
    }

    const config = getConfig();
    const outDir = path.join(process.cwd(), 'debug_output');
    fs.mkdirSync(outDir, { recursive: true });

    console.log('1️⃣ Preparing image...');
    const prepared = await new SharpImagePreparer().prepare(fs.readFileSync(imagePath));
    const preparedPath = path.join(outDir, 'prepared.png');
    fs.writeFileSync(preparedPath, prepared.bytes);
    console.log(`   ${prepared.originalWidth}x${prepared.originalHeight} -> ${prepared.width}x${prepared.height} (${prepared.targetAspectRatio})`);
    console.log(`   Saved ${preparedPath}`);

    const credentialProvider = new GoogleCredentialProvider();
    const endpoints = new VertexEndpoints({ projectId: config.gcpProjectId, location: config.gcpRegion });

    console.log('2️⃣ Submitting job...');
    const variant = resolveModelVariant(variantArg, prepared.targetAspectRatio, {
        veo3Resolution: config.veo3Resolution,
        veo2DurationSeconds: config.veo2DurationSeconds,
    });
    const handle = await new VeoJobSubmitter(endpoints, credentialProvider).submit({
        imageBytes: prepared.bytes,
        mimeType: prepared.mimeType,
        prompt: config.defaultVideoPrompt || FALLBACK_VIDEO_PROMPT,
        variant,
        outputUriPrefix: config.outputUriPrefix,
    });
    console.log(`   Operation: ${handle.operationName}`);
    console.log(`   Output:    ${handle.storageUri}`);

    console.log('3️⃣ Polling...');
    const poller = new VeoOperationPoller(endpoints, {
        pollIntervalMs: config.pollIntervalMs,
        maxAttempts: config.pollMaxAttempts,
        requestKey: config.pollRequestKey,
    });
    const result = await poller.poll(handle, credentialProvider);
    console.log('   Result:', JSON.stringify(result, null, 2));

    console.log('4️⃣ Downloading...');
    const [videoUri] = extractVideoUris(result, handle.operationName);
    const videoPath = path.join(outDir, 'generated.mp4');
    await new GcsStorageClient({ projectId: config.gcpProjectId }).downloadToFile(videoUri, videoPath);
    console.log(`✅ Saved ${videoPath}`);
}

debugGeneration().catch((error) => {
    console.error('❌ Debug generation failed:', error);
    if (error instanceof PipelineError && error.details !== undefined) {
        console.error('Details:', JSON.stringify(error.details, null, 2));
    }
    process.exit(1);
});
