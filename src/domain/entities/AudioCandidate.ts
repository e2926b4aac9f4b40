import * as path from 'path';

/**
 * A file that passed existence checks, with attributes derived from disk.
 * Computed fresh on every validation; never cached.
 */
export interface AudioCandidate {
    path: string;
    /** Lower-cased, including the leading "." (".wav") */
    extension: string;
    sizeBytes: number;
    /** Base name without extension */
    stem: string;
}

/**
 * Allow-list and size limit applied to every candidate.
 */
export interface ValidationPolicy {
    readonly supportedExtensions: ReadonlySet<string>;
    readonly maxFileSizeBytes: number;
}

export function fileStem(filePath: string): string {
    return path.parse(filePath).name;
}

export function fileExtension(filePath: string): string {
    return path.extname(filePath).toLowerCase();
}
