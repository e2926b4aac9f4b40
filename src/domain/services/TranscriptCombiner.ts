import { BatchResult } from '../entities/BatchResult';

export const DEFAULT_TRANSCRIPT_SEPARATOR = '\n\n--- Next Audio ---\n\n';

export const COMBINED_TRANSCRIPT_FILENAME = 'combined_transcript.txt';

/**
 * Joins batch transcripts in insertion order.
 */
export function combineTranscripts(
    results: BatchResult,
    separator: string = DEFAULT_TRANSCRIPT_SEPARATOR
): string {
    return Array.from(results.values()).join(separator);
}
