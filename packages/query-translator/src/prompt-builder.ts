/**
 * Prompt Builder
 *
 * Fixed instruction template for translating a post search query into
 * filter parameters. The JSON skeleton doubles as the output schema.
 */

export const KNOWN_POST_TYPES = ['job', 'internship', 'event', 'news'] as const;

export function buildTranslationPrompt(nlQuery: string): string {
    return `Analyze the user's natural language search query and extract parameters for filtering posts.

Query: ${nlQuery}

Rules:
- "post_types": any of ${KNOWN_POST_TYPES.map(t => `"${t}"`).join(', ')}; empty when the query does not restrict the type
- "keywords": short words or phrases that must appear in the post
- "categories": topical categories such as "tech", "health", "education"
- "time_filter": one of "today", "this week", "this month", or null
- "location_type": "nearby" when the user asks for something close to them, otherwise null

Output ONLY the JSON object, nothing else:
{
  "post_types": [],
  "keywords": [],
  "categories": [],
  "time_filter": null,
  "location_type": null
}
`;
}
