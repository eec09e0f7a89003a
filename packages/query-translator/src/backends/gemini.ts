/**
 * Gemini Completion Backend
 */

import { GoogleGenerativeAI, type GenerativeModel } from '@google/generative-ai';
import type { CompletionBackend } from '@cityscope/types';

export interface GeminiBackendOptions {
    apiKey?: string;
    model?: string;
    temperature?: number;
}

export class GeminiBackend implements CompletionBackend {
    readonly name = 'gemini';

    private model: GenerativeModel;

    constructor(options: GeminiBackendOptions = {}) {
        const apiKey = options.apiKey || '';
        if (!apiKey) {
            throw new Error('GEMINI_API_KEY is required');
        }

        const genAI = new GoogleGenerativeAI(apiKey);
        this.model = genAI.getGenerativeModel({
            model: options.model || 'gemini-2.0-flash',
            generationConfig: {
                responseMimeType: 'application/json',
                temperature: options.temperature ?? 0.2,
            },
        });
    }

    async complete(prompt: string, signal: AbortSignal): Promise<string> {
        const result = await this.model.generateContent(prompt, { signal });
        return result.response.text();
    }
}
