/**
 * Result of transcribing one file. A skipped outcome carries the reason
 * so callers have to handle it instead of relying on a missing value.
 */
export type TranscriptionOutcome =
    | { status: 'transcribed'; text: string; savedTo?: string }
    | { status: 'skipped'; reason: SkipReason; message: string };

export type SkipReason = 'validation' | 'backend';
