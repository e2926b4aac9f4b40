/**
 * AudioFileValidator - pre-flight checks run before any backend call.
 *
 * Checks, in order, stopping at the first failure:
 * - the path is an existing regular file
 * - the extension is on the allow-list (case-insensitive)
 * - the size does not exceed the configured maximum
 */

import * as fs from 'fs';
import { AudioCandidate, ValidationPolicy, fileExtension, fileStem } from '../../domain/entities/AudioCandidate';
import { AudioValidationError, systemErrorCode } from '../../domain/errors/TranscriberErrors';
import { IReporter } from '../../domain/ports/IReporter';

export type AudioValidationResult =
    | { valid: true; candidate: AudioCandidate }
    | { valid: false; error: AudioValidationError };

const BYTES_PER_MB = 1024 * 1024;

function toMegabytes(bytes: number): number {
    return bytes / BYTES_PER_MB;
}

export class AudioFileValidator {
    constructor(
        private readonly policy: ValidationPolicy,
        private readonly reporter: IReporter
    ) { }

    /**
     * Returns false, after reporting the failing condition, when the file
     * cannot be submitted. Never throws.
     */
    async validate(filePath: string): Promise<boolean> {
        const result = await this.inspect(filePath);
        if (!result.valid) {
            this.reporter.error(result.error.message);
            return false;
        }
        return true;
    }

    /**
     * Same checks as validate, returning the structured result without reporting.
     */
    async inspect(filePath: string): Promise<AudioValidationResult> {
        let stats: fs.Stats;
        try {
            stats = await fs.promises.stat(filePath);
        } catch (error) {
            const code = systemErrorCode(error) ?? 'UNKNOWN';
            const message = code === 'ENOENT' || code === 'ENOTDIR'
                ? `Error: File does not exist: ${filePath}`
                : `Error: Cannot access file: ${filePath} (${code})`;
            return { valid: false, error: new AudioValidationError('missing', filePath, message) };
        }

        if (!stats.isFile()) {
            return {
                valid: false,
                error: new AudioValidationError('missing', filePath, `Error: Not a regular file: ${filePath}`),
            };
        }

        const extension = fileExtension(filePath);
        if (!this.policy.supportedExtensions.has(extension)) {
            const supported = Array.from(this.policy.supportedExtensions).join(', ');
            return {
                valid: false,
                error: new AudioValidationError(
                    'unsupported-format',
                    filePath,
                    `Error: Unsupported format '${extension}'. Supported formats: ${supported}`
                ),
            };
        }

        if (stats.size > this.policy.maxFileSizeBytes) {
            return {
                valid: false,
                error: new AudioValidationError(
                    'too-large',
                    filePath,
                    `Error: File size (${toMegabytes(stats.size).toFixed(1)} MB) exceeds ${toMegabytes(this.policy.maxFileSizeBytes)} MB limit`
                ),
            };
        }

        return {
            valid: true,
            candidate: {
                path: filePath,
                extension,
                sizeBytes: stats.size,
                stem: fileStem(filePath),
            },
        };
    }
}
