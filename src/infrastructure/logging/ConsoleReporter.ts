import { IReporter, InfoIcon, ProgressIcon } from '../../domain/ports/IReporter';

const ICONS: Record<ProgressIcon | InfoIcon | 'error' | 'warn', string> = {
    transcribing: '🎵',
    success: '✅',
    stored: '📝',
    saved: '💾',
    title: '🎤',
    key: '🔑',
    transcript: '📄',
    goodbye: '👋',
    error: '❌',
    warn: '⚠️',
};

export interface ConsoleReporterOptions {
    showProgress: boolean;
    useDecorativeOutput: boolean;
}

/**
 * Console-backed reporter. Errors go to stderr, everything else to stdout.
 */
export class ConsoleReporter implements IReporter {
    constructor(private readonly options: ConsoleReporterOptions) { }

    progress(icon: ProgressIcon, message: string): void {
        if (!this.options.showProgress) {
            return;
        }
        console.log(this.decorate(icon, message));
    }

    info(message: string, icon?: InfoIcon): void {
        console.log(icon ? this.decorate(icon, message) : message);
    }

    success(message: string): void {
        console.log(this.decorate('success', message));
    }

    warn(message: string): void {
        console.warn(this.decorate('warn', message));
    }

    error(message: string): void {
        console.error(this.decorate('error', message));
    }

    private decorate(icon: keyof typeof ICONS, message: string): string {
        return this.options.useDecorativeOutput ? `${ICONS[icon]} ${message}` : message;
    }
}
