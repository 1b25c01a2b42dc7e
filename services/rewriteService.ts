// services/rewriteService.ts
import logger from '../utils/logger';
import { CONSTANTS } from '../utils/constants';
import { countSentences, extractJSON, sleep as defaultSleep } from '../utils/helpers';
import { RewriteFailedError, TextGenerationError, describeError } from '../utils/errors';
import { RewriteResponseSchema } from '../utils/validationSchemas';
import { REWRITE_SYSTEM_INSTRUCTION, buildRewritePrompt } from '../utils/prompts';
import type { IArticle, RewrittenArticle } from '../types';
import type { ITextGenerator } from './ai/ITextGenerator';

export interface RewriteOptions {
    generator: ITextGenerator;
    maxRetries: number;
    baseDelayMs: number;
    sleep?: (ms: number) => Promise<void>;
}

export type RewriteOutcome =
    | { ok: true; article: RewrittenArticle; attempts: number }
    | { ok: false; article: IArticle; error: RewriteFailedError };

type AttemptResult =
    | { kind: 'ok'; title: string; description: string }
    | { kind: 'retry'; reason: string }
    | { kind: 'fatal'; reason: string };

class RewriteService {
    private readonly sleep: (ms: number) => Promise<void>;

    constructor(private readonly options: RewriteOptions) {
        this.sleep = options.sleep ?? defaultSleep;
    }

    /**
     * Rewrites one article. Never throws for generation problems: the outcome
     * carries either the rewritten record or a `rewrite_failed` copy of the input.
     */
    public async rewrite(article: IArticle): Promise<RewriteOutcome> {
        const { maxRetries, baseDelayMs } = this.options;
        const maxAttempts = maxRetries + 1;
        let lastReason = 'no attempt made';

        logger.info(`✍️ Rewriting: ${article.originalTitle.slice(0, 60)}`);

        for (let attempt = 0; attempt < maxAttempts; attempt++) {
            const result = await this.attempt(article);

            if (result.kind === 'ok') {
                const { failureReason: _previous, ...rest } = article;
                return {
                    ok: true,
                    attempts: attempt + 1,
                    article: {
                        ...rest,
                        rewrittenTitle: result.title,
                        rewrittenDescription: result.description,
                        status: 'rewritten',
                    },
                };
            }

            lastReason = result.reason;

            if (result.kind === 'fatal') {
                return this.fail(article, lastReason, attempt + 1);
            }

            if (attempt < maxAttempts - 1) {
                const delay = baseDelayMs * Math.pow(2, attempt);
                logger.warn(`↻ Rewrite attempt ${attempt + 1}/${maxAttempts} for ${article.id} failed (${lastReason}). Retrying in ${delay}ms`);
                await this.sleep(delay);
            }
        }

        return this.fail(article, lastReason, maxAttempts);
    }

    private async attempt(article: IArticle): Promise<AttemptResult> {
        let raw: string;
        try {
            raw = await this.options.generator.generate({
                system: REWRITE_SYSTEM_INSTRUCTION,
                prompt: buildRewritePrompt({
                    sourceName: article.sourceName,
                    title: article.originalTitle,
                    description: article.originalDescription,
                }),
            });
        } catch (err) {
            if (err instanceof TextGenerationError) {
                return { kind: err.retryable ? 'retry' : 'fatal', reason: err.message };
            }
            return { kind: 'fatal', reason: describeError(err) };
        }

        let parsed: unknown;
        try {
            parsed = JSON.parse(extractJSON(raw));
        } catch (err) {
            return { kind: 'retry', reason: `Malformed JSON: ${describeError(err)}` };
        }

        const validation = RewriteResponseSchema.safeParse(parsed);
        if (!validation.success) {
            const issues = validation.error.issues.map(i => `${i.path.join('.') || 'reply'}: ${i.message}`).join(', ');
            return { kind: 'retry', reason: `Malformed reply: ${issues}` };
        }

        const title = validation.data.rewritten_title;
        const description = validation.data.rewritten_description;
        const sentences = countSentences(description);

        if (sentences > CONSTANTS.REWRITE.MAX_SENTENCES) {
            return {
                kind: 'retry',
                reason: `Description has ${sentences} sentences (max ${CONSTANTS.REWRITE.MAX_SENTENCES})`,
            };
        }

        return { kind: 'ok', title, description };
    }

    private fail(article: IArticle, reason: string, attempts: number): RewriteOutcome {
        const error = new RewriteFailedError(article.id, reason, attempts);
        logger.error(`✗ ${error.message}`);
        return {
            ok: false,
            error,
            article: { ...article, status: 'rewrite_failed', failureReason: reason },
        };
    }
}

export default RewriteService;
