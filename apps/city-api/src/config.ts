/**
 * Configuration
 *
 * Environment variables validated once at start-up. Every downstream service
 * receives plain values from AppConfig, never process.env.
 */

import { z } from 'zod';

const optionalString = z.string().trim().optional().transform(value => value || undefined);

const EnvSchema = z.object({
    PORT: z.coerce.number().int().min(0).max(65535).default(3300),

    NEWSAPI_KEY: optionalString,
    SERPAPI_API_KEY: optionalString,
    SERPER_API_KEY: optionalString,
    NEWS_COUNTRY: z.string().trim().min(2).default('cm'),
    NEWS_LANGUAGE: z.string().trim().min(2).default('en'),
    NEWS_DEFAULT_QUERY: z.string().trim().min(1).default('Cameroon'),
    NEWS_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),

    LLM_BACKEND: z.enum(['gemini', 'ollama']).default('gemini'),
    GEMINI_API_KEY: optionalString,
    GEMINI_MODEL: z.string().trim().min(1).default('gemini-2.0-flash'),
    OLLAMA_URL: optionalString.pipe(z.string().url().optional()),
    OLLAMA_MODEL: z.string().trim().min(1).default('qwen2:0.5b'),
    TRANSLATION_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),

    STORE_BACKEND: z.enum(['memory', 'firestore']).default('memory'),
    FIRESTORE_PROJECT_ID: optionalString,
}).superRefine((env, ctx) => {
    if (env.LLM_BACKEND === 'ollama' && !env.OLLAMA_URL) {
        ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['OLLAMA_URL'],
            message: 'OLLAMA_URL is required when LLM_BACKEND=ollama',
        });
    }
});

export type Env = z.infer<typeof EnvSchema>;

export interface AppConfig {
    port: number;
    news: {
        keys: {
            newsapi?: string;
            serpapi?: string;
            serper?: string;
        };
        country: string;
        language: string;
        defaultQuery: string;
        timeoutMs: number;
    };
    llm:
    | { backend: 'gemini'; apiKey?: string; model: string; timeoutMs: number }
    | { backend: 'ollama'; url: string; model: string; timeoutMs: number };
    store: {
        backend: 'memory' | 'firestore';
        projectId?: string;
    };
}

export class ConfigError extends Error {
    constructor(public readonly issues: string[]) {
        super(`Invalid configuration:\n  ${issues.join('\n  ')}`);
        this.name = 'ConfigError';
    }
}

/**
 * Parse an environment map into AppConfig. Throws ConfigError listing every
 * invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const parsed = EnvSchema.safeParse(env);
    if (!parsed.success) {
        throw new ConfigError(parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`));
    }
    const e = parsed.data;

    return {
        port: e.PORT,
        news: {
            keys: {
                newsapi: e.NEWSAPI_KEY,
                serpapi: e.SERPAPI_API_KEY,
                serper: e.SERPER_API_KEY,
            },
            country: e.NEWS_COUNTRY,
            language: e.NEWS_LANGUAGE,
            defaultQuery: e.NEWS_DEFAULT_QUERY,
            timeoutMs: e.NEWS_TIMEOUT_MS,
        },
        llm: e.LLM_BACKEND === 'ollama' && e.OLLAMA_URL
            ? { backend: 'ollama', url: e.OLLAMA_URL, model: e.OLLAMA_MODEL, timeoutMs: e.TRANSLATION_TIMEOUT_MS }
            : { backend: 'gemini', apiKey: e.GEMINI_API_KEY, model: e.GEMINI_MODEL, timeoutMs: e.TRANSLATION_TIMEOUT_MS },
        store: {
            backend: e.STORE_BACKEND,
            projectId: e.FIRESTORE_PROJECT_ID,
        },
    };
}
