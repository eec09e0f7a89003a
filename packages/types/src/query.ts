/**
 * Query Translation Types
 */

export type TimeWindow = 'none' | 'today' | 'thisWeek' | 'thisMonth';

/**
 * Structured filter extracted from a natural-language query.
 */
export interface StructuredFilter {
    postTypes: Set<string>;
    keywords: string[];
    categories: Set<string>;
    timeWindow: TimeWindow;
    proximityIntent: boolean;
}

/**
 * Any text-completion service able to answer a single prompt.
 */
export interface CompletionBackend {
    /** Backend name for logging */
    readonly name: string;

    /**
     * Returns the raw completion text. Rejects on transport errors
     * and when the signal aborts.
     */
    complete(prompt: string, signal: AbortSignal): Promise<string>;
}

export interface QueryTranslator {
    translate(nlQuery: string): Promise<StructuredFilter>;
}
