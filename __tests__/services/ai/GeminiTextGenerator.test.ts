import { describe, it, expect, vi } from 'vitest';
import { GeminiTextGenerator } from '../../../services/ai/GeminiTextGenerator';
import { TextGenerationError } from '../../../utils/errors';
import { fakeHttp, timeoutError } from '../../fixtures/http';
import type { Responder } from '../../fixtures/http';

const makeBreaker = (closed = true) => ({
    allowsRequests: vi.fn(async (_provider: string) => closed),
    recordFailure: vi.fn(async (_provider: string) => undefined),
    recordSuccess: vi.fn(async (_provider: string) => undefined),
});

const setup = (respond: Responder, options: { apiKey?: string; breakerTripped?: boolean } = {}) => {
    const { http, calls } = fakeHttp(respond);
    const breaker = makeBreaker(!options.breakerTripped);
    const generator = new GeminiTextGenerator({
        apiKey: 'apiKey' in options ? options.apiKey : 'test-secret',
        model: 'gemini-test',
        timeoutMs: 1000,
        http,
        breaker,
    });
    return { generator, calls, breaker };
};

const request = { system: 'Be brief.', prompt: 'Rewrite this.' };

const failureOf = async (promise: Promise<unknown>): Promise<TextGenerationError> => {
    try {
        await promise;
    } catch (err) {
        if (err instanceof TextGenerationError) return err;
        throw err;
    }
    throw new Error('expected a TextGenerationError');
};

describe('GeminiTextGenerator', () => {
    it('posts the prompt with a structured-output config and joins the reply parts', async () => {
        const { generator, calls, breaker } = setup(() => ({
            status: 200,
            data: { candidates: [{ content: { parts: [{ text: '{"rewritten_title":"T",' }, { text: '"rewritten_description":"D"}' }] } }] },
        }));

        const text = await generator.generate(request);

        expect(text).toBe('{"rewritten_title":"T","rewritten_description":"D"}');
        expect(calls).toHaveLength(1);
        expect(calls[0].url).toBe('https://generativelanguage.googleapis.com/v1beta/models/gemini-test:generateContent?key=test-secret');
        expect(calls[0].timeout).toBe(1000);

        const body: unknown = JSON.parse(String(calls[0].data));
        expect(body).toMatchObject({
            systemInstruction: { parts: [{ text: 'Be brief.' }] },
            contents: [{ role: 'user', parts: [{ text: 'Rewrite this.' }] }],
            generationConfig: { responseMimeType: 'application/json', maxOutputTokens: 600 },
        });
        expect(breaker.recordSuccess).toHaveBeenCalledWith('GEMINI');
    });

    it('fails without retry when no key is configured', async () => {
        const { generator, calls } = setup(() => ({ status: 200 }), { apiKey: undefined });

        const error = await failureOf(generator.generate(request));

        expect(error.retryable).toBe(false);
        expect(error.statusCode).toBe(500);
        expect(calls).toHaveLength(0);
    });

    it('does not call out while the breaker is open', async () => {
        const { generator, calls } = setup(() => ({ status: 200 }), { breakerTripped: true });

        const error = await failureOf(generator.generate(request));

        expect(error.retryable).toBe(true);
        expect(error.statusCode).toBe(503);
        expect(calls).toHaveLength(0);
    });

    it('treats quota errors as retryable without tripping the breaker', async () => {
        const { generator, breaker } = setup(() => ({ status: 429 }));

        const error = await failureOf(generator.generate(request));

        expect(error.retryable).toBe(true);
        expect(error.statusCode).toBe(429);
        expect(breaker.recordFailure).not.toHaveBeenCalled();
    });

    it('records server errors against the breaker', async () => {
        const { generator, breaker } = setup(() => ({ status: 500 }));

        const error = await failureOf(generator.generate(request));

        expect(error.retryable).toBe(true);
        expect(error.statusCode).toBe(503);
        expect(breaker.recordFailure).toHaveBeenCalledWith('GEMINI');
    });

    it('maps client timeouts to 504', async () => {
        const { generator, breaker } = setup((config) => { throw timeoutError(config); });

        const error = await failureOf(generator.generate(request));

        expect(error.retryable).toBe(true);
        expect(error.statusCode).toBe(504);
        expect(breaker.recordFailure).toHaveBeenCalledTimes(1);
    });

    it('does not retry other client errors', async () => {
        const { generator } = setup(() => ({ status: 400 }));

        const error = await failureOf(generator.generate(request));

        expect(error.retryable).toBe(false);
        expect(error.statusCode).toBe(400);
        expect(error.message).toBe('Text generation rejected with status 400');
    });

    it('treats an empty reply as retryable', async () => {
        const { generator } = setup(() => ({ status: 200, data: { candidates: [] } }));

        const error = await failureOf(generator.generate(request));

        expect(error.retryable).toBe(true);
        expect(error.message).toBe('Text generation returned empty content (no candidates)');
    });
});
