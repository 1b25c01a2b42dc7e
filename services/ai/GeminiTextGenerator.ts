// services/ai/GeminiTextGenerator.ts
import axios from 'axios';
import apiClient, { HttpClient } from '../../utils/apiClient';
import circuitBreaker from '../../utils/CircuitBreaker';
import logger from '../../utils/logger';
import { CONSTANTS } from '../../utils/constants';
import { TextGenerationError, describeError } from '../../utils/errors';
import { REWRITE_RESPONSE_SCHEMA } from '../../utils/prompts';
import type { IGeminiResponse } from '../../types';
import type { ITextGenerator, TextGenerationRequest } from './ITextGenerator';

const PROVIDER = CONSTANTS.PROVIDERS.TEXT_GENERATION;

type Breaker = Pick<typeof circuitBreaker, 'allowsRequests' | 'recordFailure' | 'recordSuccess'>;

export interface GeminiOptions {
    apiKey?: string;
    model: string;
    timeoutMs: number;
    http?: HttpClient;
    breaker?: Breaker;
}

// Design and architecture coverage rarely trips safety filters; keep only the hard blocks.
const SAFETY_SETTINGS = [
    { category: "HARM_CATEGORY_HARASSMENT", threshold: "BLOCK_ONLY_HIGH" },
    { category: "HARM_CATEGORY_HATE_SPEECH", threshold: "BLOCK_ONLY_HIGH" },
    { category: "HARM_CATEGORY_SEXUALLY_EXPLICIT", threshold: "BLOCK_ONLY_HIGH" },
    { category: "HARM_CATEGORY_DANGEROUS_CONTENT", threshold: "BLOCK_ONLY_HIGH" }
];

const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT']);

export class GeminiTextGenerator implements ITextGenerator {
    name = 'Gemini';
    private readonly http: HttpClient;
    private readonly breaker: Breaker;

    constructor(private readonly options: GeminiOptions) {
        this.http = options.http ?? apiClient;
        this.breaker = options.breaker ?? circuitBreaker;

        if (!options.apiKey) {
            logger.warn("⚠️ No Gemini API Key found in config. Every rewrite will fail.");
        }
    }

    async generate({ system, prompt }: TextGenerationRequest): Promise<string> {
        const { apiKey, model, timeoutMs } = this.options;

        if (!apiKey) {
            throw new TextGenerationError('GEMINI_API_KEY is not configured', false, 500);
        }

        // 1. Circuit Breaker Check
        if (!(await this.breaker.allowsRequests(PROVIDER))) {
            throw new TextGenerationError('Circuit breaker open for text generation', true, 503);
        }

        const url = `https://generativelanguage.googleapis.com/v1beta/models/${model}:generateContent?key=${apiKey}`;

        let data: IGeminiResponse;
        try {
            // 2. Call API with Strict Schema
            const response = await this.http.post<IGeminiResponse>(url, {
                systemInstruction: { parts: [{ text: system }] },
                contents: [{ role: 'user', parts: [{ text: prompt }] }],
                safetySettings: SAFETY_SETTINGS,
                generationConfig: {
                    responseMimeType: "application/json",
                    responseSchema: REWRITE_RESPONSE_SCHEMA,
                    temperature: 0.7,
                    maxOutputTokens: CONSTANTS.REWRITE.MAX_OUTPUT_TOKENS
                }
            }, { timeout: timeoutMs });
            data = response.data;
        } catch (error) {
            throw await this.handleAIError(error);
        }

        await this.breaker.recordSuccess(PROVIDER);

        const text = (data.candidates?.[0]?.content?.parts ?? [])
            .map(part => part.text ?? '')
            .join('')
            .trim();

        if (!text) {
            const reason = data.candidates?.[0]?.finishReason ?? 'no candidates';
            throw new TextGenerationError(`Text generation returned empty content (${reason})`, true);
        }
        return text;
    }

    /**
     * Maps transport failures onto TextGenerationError.
     * 408, 429, 5xx, timeouts and dropped connections are retryable; other 4xx are not.
     */
    private async handleAIError(error: unknown): Promise<TextGenerationError> {
        if (!axios.isAxiosError(error)) {
            logger.error(`❌ AI Critical Failure: ${describeError(error)}`);
            return new TextGenerationError(describeError(error), false, 500);
        }

        const status = error.response?.status;

        if (status === 429) {
            logger.warn('🛑 Gemini Quota Exceeded. Backing off.');
            return new TextGenerationError('Text generation quota exceeded', true, 429);
        }

        if (status === 408 || (error.code && TIMEOUT_CODES.has(error.code))) {
            await this.breaker.recordFailure(PROVIDER);
            return new TextGenerationError('Text generation timed out', true, 504);
        }

        if (status === undefined || status >= 500) {
            await this.breaker.recordFailure(PROVIDER);
            return new TextGenerationError(`Text generation unavailable: ${error.message}`, true, 503);
        }

        logger.error(`❌ AI Request Rejected (${status}): ${error.message}`);
        return new TextGenerationError(`Text generation rejected with status ${status}`, false, status);
    }
}

export default GeminiTextGenerator;
