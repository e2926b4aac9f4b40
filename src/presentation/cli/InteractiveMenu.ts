import * as path from 'path';
import { Config } from '../../config';
import { COMBINED_TRANSCRIPT_FILENAME, combineTranscripts } from '../../domain/services/TranscriptCombiner';
import { Transcriber } from '../../application/TranscriberFactory';
import { Prompter, cleanPathAnswer } from './Prompter';

const RULE = '='.repeat(50);

export type MenuSettings = Pick<Config, 'autoSaveTranscripts' | 'outputDirectory'>;

/**
 * Menu-driven front end: single file, multiple files, exit.
 */
export class InteractiveMenu {
    constructor(
        private readonly transcriber: Transcriber,
        private readonly prompter: Prompter,
        private readonly settings: MenuSettings,
        private readonly language?: string
    ) { }

    async run(): Promise<void> {
        const { reporter } = this.transcriber;

        while (!this.prompter.isClosed()) {
            reporter.info('\nChoose an option:');
            reporter.info('1. Transcribe a single audio file');
            reporter.info('2. Transcribe multiple audio files');
            reporter.info('3. Exit');

            const choice = await this.prompter.ask('\nEnter your choice (1-3): ');

            if (choice === '1') {
                await this.transcribeSingle();
            } else if (choice === '2') {
                await this.transcribeMultiple();
            } else if (choice === '3') {
                reporter.info('Goodbye!', 'goodbye');
                return;
            } else if (!this.prompter.isClosed()) {
                reporter.error('Invalid choice. Please select 1, 2, or 3.');
            }
        }
    }

    async transcribeSingle(): Promise<void> {
        const { reporter, service, store } = this.transcriber;

        const filePath = cleanPathAnswer(await this.prompter.ask('Enter the path to your audio file: '));
        if (!filePath) {
            reporter.error('Please provide a valid file path');
            return;
        }

        const outcome = await service.transcribeOne(filePath, this.language);
        if (outcome.status !== 'transcribed') {
            return;
        }

        reporter.info(`\n${RULE}`);
        reporter.info('TRANSCRIPT:', 'transcript');
        reporter.info(RULE);
        reporter.info(outcome.text);
        reporter.info(RULE);

        if (this.settings.autoSaveTranscripts) {
            // A failed auto-save has already been reported
            if (outcome.savedTo) {
                reporter.info('Transcript automatically saved (AUTO_SAVE_TRANSCRIPTS is enabled)', 'saved');
            }
            return;
        }

        const saveChoice = await this.prompter.ask('\nSave transcript to file? (y/n): ');
        if (saveChoice.toLowerCase() !== 'y') {
            return;
        }
        const answer = cleanPathAnswer(await this.prompter.ask('Enter output file path (or press Enter for default): '));
        await store.save(outcome.text, answer || service.outputPathFor(filePath));
    }

    async transcribeMultiple(): Promise<void> {
        const { reporter, orchestrator, store } = this.transcriber;

        reporter.info('Enter audio file paths (one per line, empty line to finish):');
        const filePaths: string[] = [];
        for (;;) {
            const filePath = cleanPathAnswer(await this.prompter.ask('File path: '));
            if (!filePath) {
                break;
            }
            filePaths.push(filePath);
        }

        if (filePaths.length === 0) {
            reporter.error('No file paths provided');
            return;
        }

        const transcriptions = await orchestrator.transcribeMany(filePaths, this.language);
        if (transcriptions.size === 0) {
            return;
        }

        reporter.success(`Successfully transcribed ${transcriptions.size} files`);
        for (const [key, text] of transcriptions) {
            reporter.info(`\n${'='.repeat(20)} ${key} ${'='.repeat(20)}`);
            reporter.info(text);
        }

        if (this.settings.autoSaveTranscripts) {
            reporter.info('Individual transcripts automatically saved (AUTO_SAVE_TRANSCRIPTS is enabled)', 'saved');
            return;
        }

        const saveChoice = await this.prompter.ask('\nSave combined transcript to file? (y/n): ');
        if (saveChoice.toLowerCase() !== 'y') {
            return;
        }
        const answer = cleanPathAnswer(
            await this.prompter.ask(`Enter output file path (or press Enter for '${COMBINED_TRANSCRIPT_FILENAME}'): `)
        );
        const defaultPath = path.join(this.settings.outputDirectory || '.', COMBINED_TRANSCRIPT_FILENAME);
        await store.save(combineTranscripts(transcriptions), answer || defaultPath);
    }
}
