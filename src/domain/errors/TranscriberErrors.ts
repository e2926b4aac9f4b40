/**
 * Error taxonomy for the transcriber.
 * Only ConfigurationError is fatal; the others are reported per item.
 */
export class TranscriberError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'TranscriberError';
    }
}

export type AudioValidationErrorKind = 'missing' | 'unsupported-format' | 'too-large';

/**
 * A candidate file was rejected before any backend call.
 */
export class AudioValidationError extends TranscriberError {
    constructor(
        public readonly kind: AudioValidationErrorKind,
        public readonly filePath: string,
        message: string
    ) {
        super(message);
        this.name = 'AudioValidationError';
    }
}

/**
 * The transcription backend rejected the request or could not be reached.
 */
export class TranscriptionError extends TranscriberError {
    constructor(
        message: string,
        public readonly statusCode?: number
    ) {
        super(message);
        this.name = 'TranscriptionError';
    }
}

/**
 * Missing or invalid configuration. Terminates the CLI.
 */
export class ConfigurationError extends TranscriberError {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigurationError';
    }
}

// fs errors are not `instanceof Error` under Jest's module sandbox; match on shape.
export function describeError(error: unknown): string {
    if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
        return error.message;
    }
    return String(error);
}

/**
 * The system error code (`ENOENT`, `EACCES`, ...) carried by a rejected fs call.
 */
export function systemErrorCode(error: unknown): string | undefined {
    if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
        return error.code;
    }
    return undefined;
}
