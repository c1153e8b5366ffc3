import axios from 'axios';
import { IPromptGenerator } from '../../domain/ports/IPromptGenerator';
import { ICredentialProvider } from '../../domain/ports/ICredentialProvider';
import { errorMessage } from '../../domain/errors/PipelineErrors';
import { VertexEndpoints } from '../generation/VertexEndpoints';
import { FALLBACK_VIDEO_PROMPT, PROMPT_WRITER_INSTRUCTIONS } from './Prompts';

/**
 * Writes a cinematic generation prompt for an image with a Gemini model.
 * Any failure degrades to FALLBACK_VIDEO_PROMPT.
 */
export class GeminiPromptGenerator implements IPromptGenerator {
    constructor(
        private readonly endpoints: VertexEndpoints,
        private readonly credentialProvider: ICredentialProvider,
        private readonly model: string = 'gemini-2.5-flash',
        private readonly fallbackPrompt: string = FALLBACK_VIDEO_PROMPT
    ) { }

    async generatePrompt(imageBytes: Buffer, mimeType: string): Promise<string> {
        console.log(`[PromptGenerator] Requesting prompt from ${this.model}`);

        try {
            const token = await this.credentialProvider.getAccessToken();
            const response = await axios.post(
                this.endpoints.generateContentUrl(this.model),
                {
                    contents: [
                        {
                            role: 'user',
                            parts: [
                                { inlineData: { mimeType, data: imageBytes.toString('base64') } },
                                { text: PROMPT_WRITER_INSTRUCTIONS },
                            ],
                        },
                    ],
                },
                {
                    headers: {
                        'Authorization': `Bearer ${token}`,
                        'Content-Type': 'application/json',
                    },
                    timeout: 60000,
                }
            );

            const text = readCandidateText(response.data);
            if (!text) {
                console.warn('[PromptGenerator] Empty response, using fallback prompt');
                return this.fallbackPrompt;
            }

            console.log(`[PromptGenerator] Prompt: ${text.substring(0, 120)}${text.length > 120 ? '...' : ''}`);
            return text;
        } catch (error) {
            console.warn(`[PromptGenerator] Prompt generation failed, using fallback: ${errorMessage(error)}`);
            return this.fallbackPrompt;
        }
    }
}

interface GenerateContentResponse {
    candidates?: Array<{
        content?: { parts?: Array<{ text?: string }> };
    }>;
}

function isGenerateContentResponse(value: unknown): value is GenerateContentResponse {
    if (typeof value !== 'object' || value === null) {
        return false;
    }
    const candidates: unknown = Reflect.get(value, 'candidates');
    return candidates === undefined || Array.isArray(candidates);
}

function readCandidateText(data: unknown): string {
    if (!isGenerateContentResponse(data)) {
        return '';
    }
    const parts = data.candidates?.[0]?.content?.parts ?? [];
    return parts
        .map((part) => part.text ?? '')
        .join('')
        .trim();
}
