const STOP_WORDS = new Set([
    'the', 'and', 'for', 'are', 'but', 'not', 'you', 'all', 'any', 'can', 'has', 'her',
    'was', 'one', 'our', 'out', 'his', 'how', 'its', 'who', 'did', 'get', 'this', 'that',
    'with', 'from', 'have', 'what', 'when', 'your', 'into', 'about', 'which', 'there',
]);

const MAX_KEYWORDS = 8;

/** Lower-cased, de-duplicated search terms of three or more characters. */
export function extractKeywords(text: string): string[] {
    const seen = new Set<string>();
    for (const word of text.toLowerCase().split(/[^a-z0-9_]+/)) {
        if (word.length < 3 || STOP_WORDS.has(word)) continue;
        seen.add(word);
        if (seen.size >= MAX_KEYWORDS) break;
    }
    return Array.from(seen);
}
