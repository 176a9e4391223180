/**
 * Continuation policy - decides from a round's follow-up text whether the
 * model wants another round of tool use.
 */

export type ContinuationPolicy = (followUpText: string) => boolean;

export const CONTINUATION_PHRASES: readonly string[] = [
    'let me search for more',
    'i need to find',
    'let me look up',
    'i should check',
    'additional information',
    'more details needed',
    'need to search for more',
    'search for more specific',
];

export function createPhraseContinuationPolicy(phrases: readonly string[]): ContinuationPolicy {
    const normalized = phrases.map((phrase) => phrase.toLowerCase());
    return (followUpText: string) => {
        const lower = followUpText.toLowerCase();
        return normalized.some((phrase) => lower.includes(phrase));
    };
}

/**
 * Fixed English phrase list; paraphrases and other languages read as "done".
 */
export const phraseContinuationPolicy: ContinuationPolicy = createPhraseContinuationPolicy(CONTINUATION_PHRASES);
