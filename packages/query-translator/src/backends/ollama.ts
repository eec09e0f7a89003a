/**
 * Ollama Completion Backend
 *
 * Single-message, non-streaming call to an Ollama chat endpoint.
 */

import { z } from 'zod';
import type { CompletionBackend } from '@cityscope/types';

const OllamaChatResponseSchema = z.object({
    message: z.object({
        content: z.string(),
    }),
});

export interface OllamaBackendOptions {
    /** Full chat endpoint URL, e.g. http://localhost:11434/api/chat */
    url: string;
    model?: string;
    temperature?: number;
}

export class OllamaBackend implements CompletionBackend {
    readonly name = 'ollama';

    private url: string;
    private model: string;
    private temperature: number;

    constructor(options: OllamaBackendOptions) {
        this.url = options.url;
        this.model = options.model || 'qwen2:0.5b';
        this.temperature = options.temperature ?? 0.2;
    }

    async complete(prompt: string, signal: AbortSignal): Promise<string> {
        const response = await fetch(this.url, {
            method: 'POST',
            headers: { 'Content-Type': 'application/json' },
            body: JSON.stringify({
                model: this.model,
                messages: [{ role: 'user', content: prompt }],
                temperature: this.temperature,
                stream: false,
            }),
            signal,
        });

        if (!response.ok) {
            throw new Error(`Ollama API error: ${response.status}`);
        }

        const parsed = OllamaChatResponseSchema.safeParse(await response.json());
        if (!parsed.success) {
            throw new Error('Invalid response from Ollama API: missing message.content');
        }
        return parsed.data.message.content;
    }
}
