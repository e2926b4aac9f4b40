/**
 * Batch Transcription Orchestrator
 *
 * Transcribes files one after another, in the order given.
 * A failed file is skipped and never aborts the rest of the batch.
 */

import { BatchResult, batchKey } from '../domain/entities/BatchResult';
import { IReporter } from '../domain/ports/IReporter';
import { TranscriptionService } from './services/TranscriptionService';

export interface BatchEntry {
    index: number;
    filePath: string;
    key: string;
    status: 'transcribed' | 'skipped';
}

export interface BatchTranscriptionOptions {
    /** Called once per file after it has been processed */
    onProgress?: (completed: number, total: number, current: BatchEntry) => void;
}

export class BatchTranscriptionOrchestrator {
    constructor(
        private readonly transcriber: TranscriptionService,
        private readonly reporter: IReporter
    ) { }

    async transcribeMany(
        filePaths: readonly string[],
        language?: string,
        options: BatchTranscriptionOptions = {}
    ): Promise<BatchResult> {
        const transcriptions: BatchResult = new Map();

        for (const [index, filePath] of filePaths.entries()) {
            const key = batchKey(filePath, index);
            const outcome = await this.transcriber.transcribeOne(filePath, language);

            if (outcome.status === 'transcribed') {
                transcriptions.set(key, outcome.text);
                this.reporter.progress('stored', `Transcript stored as: '${key}'`);
            } else {
                this.reporter.warn(`Skipping ${filePath} due to error`);
            }

            if (options.onProgress) {
                options.onProgress(index + 1, filePaths.length, { index, filePath, key, status: outcome.status });
            }
        }

        return transcriptions;
    }
}
