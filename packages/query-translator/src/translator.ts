/**
 * Semantic Query Translator
 *
 * One completion request per query, bounded by a timeout. Transport errors,
 * timeouts and unusable output all surface as TranslationFailedError so the
 * caller has a single failure to fall back on.
 */

import { CityScopeError, TranslationFailedError } from '@cityscope/types';
import type { CompletionBackend, QueryTranslator, StructuredFilter } from '@cityscope/types';
import { buildTranslationPrompt } from './prompt-builder.js';
import { parseStructuredFilter } from './parser.js';

export const DEFAULT_TRANSLATION_TIMEOUT_MS = 30_000;

export interface TranslatorOptions {
    /** Timeout for the completion call in ms (default 30000) */
    timeoutMs?: number;
}

export class SemanticQueryTranslator implements QueryTranslator {
    private backend: CompletionBackend;
    private timeoutMs: number;

    constructor(backend: CompletionBackend, options: TranslatorOptions = {}) {
        this.backend = backend;
        this.timeoutMs = options.timeoutMs || DEFAULT_TRANSLATION_TIMEOUT_MS;
    }

    async translate(nlQuery: string): Promise<StructuredFilter> {
        const startTime = Date.now();
        const prompt = buildTranslationPrompt(nlQuery);
        const text = await this.complete(prompt);

        const filter = parseStructuredFilter(text);
        console.log(
            `[Translator] ✓ ${this.backend.name} (${Date.now() - startTime}ms): ` +
            `types=[${[...filter.postTypes].join(', ')}] keywords=[${filter.keywords.join(', ')}] ` +
            `time=${filter.timeWindow} nearby=${filter.proximityIntent}`
        );
        return filter;
    }

    private async complete(prompt: string): Promise<string> {
        const controller = new AbortController();
        let timer: ReturnType<typeof setTimeout> | undefined;

        const timeout = new Promise<never>((_, reject) => {
            timer = setTimeout(() => {
                controller.abort();
                reject(new TranslationFailedError(`${this.backend.name} timed out after ${this.timeoutMs}ms`));
            }, this.timeoutMs);
        });

        try {
            return await Promise.race([this.backend.complete(prompt, controller.signal), timeout]);
        } catch (error) {
            if (error instanceof CityScopeError) throw error;
            const message = error instanceof Error ? error.message : String(error);
            throw new TranslationFailedError(`${this.backend.name} completion failed: ${message}`, error);
        } finally {
            clearTimeout(timer);
        }
    }
}
