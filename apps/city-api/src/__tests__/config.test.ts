import { describe, it, expect } from 'vitest';
import { ConfigError, loadConfig } from '../config.js';

describe('loadConfig', () => {
    it('applies defaults', () => {
        expect(loadConfig({})).toEqual({
            port: 3300,
            news: {
                keys: {},
                country: 'cm',
                language: 'en',
                defaultQuery: 'Cameroon',
                timeoutMs: 10000,
            },
            llm: { backend: 'gemini', model: 'gemini-2.0-flash', timeoutMs: 30000 },
            store: { backend: 'memory' },
        });
    });

    it('treats blank keys as missing', () => {
        const config = loadConfig({ NEWSAPI_KEY: 'test-secret', SERPER_API_KEY: '  ', GEMINI_API_KEY: '' });

        expect(config.news.keys).toEqual({ newsapi: 'test-secret' });
        expect(config.llm).toEqual({ backend: 'gemini', model: 'gemini-2.0-flash', timeoutMs: 30000 });
    });

    it('selects the Ollama backend', () => {
        const config = loadConfig({
            LLM_BACKEND: 'ollama',
            OLLAMA_URL: 'http://localhost:11434/api/chat',
            TRANSLATION_TIMEOUT_MS: '5000',
        });

        expect(config.llm).toEqual({
            backend: 'ollama',
            url: 'http://localhost:11434/api/chat',
            model: 'qwen2:0.5b',
            timeoutMs: 5000,
        });
    });

    it('requires a URL for Ollama', () => {
        expect(() => loadConfig({ LLM_BACKEND: 'ollama' })).toThrow(ConfigError);
        expect(() => loadConfig({ LLM_BACKEND: 'ollama' })).toThrow(
            'Invalid configuration:\n  OLLAMA_URL: OLLAMA_URL is required when LLM_BACKEND=ollama'
        );
    });

    it('lists every invalid variable', () => {
        expect(() => loadConfig({ PORT: 'abc', STORE_BACKEND: 'postgres' })).toThrow(/PORT: Expected number, received nan/);
        expect(() => loadConfig({ PORT: 'abc', STORE_BACKEND: 'postgres' })).toThrow(/STORE_BACKEND: Invalid enum value/);
    });
});
