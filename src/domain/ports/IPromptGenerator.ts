/**
 * IPromptGenerator - Port for writing a generation prompt from an image.
 * Implementations: GeminiPromptGenerator
 */
export interface IPromptGenerator {
    /** Never rejects: falls back to a fixed prompt. */
    generatePrompt(imageBytes: Buffer, mimeType: string): Promise<string>;
}
