/**
 * IReporter - Port for user-facing diagnostics and progress notes.
 */
export type ProgressIcon = 'transcribing' | 'success' | 'stored' | 'saved';

export type InfoIcon = 'title' | 'key' | 'transcript' | 'saved' | 'goodbye';

export interface IReporter {
    /** Progress note, suppressed when progress display is off */
    progress(icon: ProgressIcon, message: string): void;
    info(message: string, icon?: InfoIcon): void;
    success(message: string): void;
    warn(message: string): void;
    error(message: string): void;
}
