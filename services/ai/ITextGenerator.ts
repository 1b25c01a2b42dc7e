// services/ai/ITextGenerator.ts

export interface TextGenerationRequest {
    system: string;
    prompt: string;
}

/**
 * Returns the model's raw text. Failures throw TextGenerationError;
 * its `retryable` flag tells the caller whether another attempt can help.
 */
export interface ITextGenerator {
    name: string;
    generate(request: TextGenerationRequest): Promise<string>;
}
