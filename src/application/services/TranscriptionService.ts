import * as fs from 'fs';
import * as path from 'path';
import { Config } from '../../config';
import { fileStem } from '../../domain/entities/AudioCandidate';
import { TranscriptionOutcome } from '../../domain/entities/TranscriptionOutcome';
import { describeError } from '../../domain/errors/TranscriberErrors';
import { IReporter } from '../../domain/ports/IReporter';
import { ITranscriptionClient } from '../../domain/ports/ITranscriptionClient';
import { ITranscriptStore } from '../../domain/ports/ITranscriptStore';
import { AudioFileValidator } from '../../infrastructure/validation/AudioFileValidator';

export type TranscriptionSettings = Pick<
    Config,
    'defaultLanguage' | 'autoSaveTranscripts' | 'outputDirectory' | 'transcriptFileSuffix'
>;

export interface TranscriptionServiceDeps {
    validator: AudioFileValidator;
    client: ITranscriptionClient;
    store: ITranscriptStore;
    reporter: IReporter;
    settings: TranscriptionSettings;
}

/**
 * Transcribes a single file: validate, upload, optionally auto-save.
 * Every per-file failure ends here as a skipped outcome.
 */
export class TranscriptionService {
    constructor(private readonly deps: TranscriptionServiceDeps) { }

    async transcribeOne(filePath: string, language?: string): Promise<TranscriptionOutcome> {
        const { validator, reporter, settings } = this.deps;

        const validation = await validator.inspect(filePath);
        if (!validation.valid) {
            reporter.error(validation.error.message);
            return { status: 'skipped', reason: 'validation', message: validation.error.message };
        }

        const lang = language || settings.defaultLanguage;
        reporter.progress('transcribing', `Transcribing: ${filePath}`);

        let text: string;
        try {
            text = await this.upload(filePath, lang);
        } catch (error) {
            const message = `Error transcribing ${filePath}: ${describeError(error)}`;
            reporter.error(message);
            return { status: 'skipped', reason: 'backend', message };
        }

        reporter.progress('success', `Successfully transcribed: ${path.basename(filePath)}`);

        if (settings.autoSaveTranscripts) {
            const savedTo = await this.autoSave(text, filePath);
            return savedTo ? { status: 'transcribed', text, savedTo } : { status: 'transcribed', text };
        }
        return { status: 'transcribed', text };
    }

    /**
     * Default destination for a single transcript:
     * `{outputDirectory or source directory}/{stem}{suffix}.txt`.
     */
    outputPathFor(filePath: string): string {
        const { outputDirectory, transcriptFileSuffix } = this.deps.settings;
        const directory = outputDirectory || path.dirname(filePath);
        return path.join(directory, `${fileStem(filePath)}${transcriptFileSuffix}.txt`);
    }

    /**
     * Reads the file through a handle that is closed on every exit path,
     * including a rejected upload.
     */
    private async upload(filePath: string, language: string): Promise<string> {
        const handle = await fs.promises.open(filePath, 'r');
        try {
            const data = await handle.readFile();
            return await this.deps.client.transcribe({ data, fileName: path.basename(filePath) }, language);
        } finally {
            await handle.close();
        }
    }

    private async autoSave(text: string, filePath: string): Promise<string | undefined> {
        const outputPath = this.outputPathFor(filePath);
        try {
            // The store reports its own write failures
            if (await this.deps.store.save(text, outputPath)) {
                return outputPath;
            }
        } catch (error) {
            this.deps.reporter.warn(`Error auto-saving transcript: ${describeError(error)}`);
        }
        return undefined;
    }
}
