import type { CompletionBackend } from '@cityscope/types';
import { GeminiBackend } from './gemini.js';
import { OllamaBackend } from './ollama.js';

export type CompletionBackendConfig =
    | { backend: 'gemini'; apiKey?: string; model?: string }
    | { backend: 'ollama'; url: string; model?: string };

export function createCompletionBackend(config: CompletionBackendConfig): CompletionBackend {
    switch (config.backend) {
        case 'gemini':
            return new GeminiBackend({ apiKey: config.apiKey, model: config.model });
        case 'ollama':
            return new OllamaBackend({ url: config.url, model: config.model });
    }
}

export { GeminiBackend, type GeminiBackendOptions } from './gemini.js';
export { OllamaBackend, type OllamaBackendOptions } from './ollama.js';
