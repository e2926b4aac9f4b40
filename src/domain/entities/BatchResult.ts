import { fileStem } from './AudioCandidate';

/**
 * Transcripts keyed by `{stem}_transcript_{index}`, in insertion order.
 * Items that failed are absent; indices are not renumbered.
 */
export type BatchResult = Map<string, string>;

export function batchKey(filePath: string, index: number): string {
    return `${fileStem(filePath)}_transcript_${index}`;
}
