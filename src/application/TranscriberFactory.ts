/**
 * Transcriber Factory
 *
 * Wires the validator, backend client, store and orchestrators from one
 * immutable Config. Tests and embedding programs can swap any adapter.
 */

import { Config } from '../config';
import { IReporter } from '../domain/ports/IReporter';
import { ITranscriptionClient } from '../domain/ports/ITranscriptionClient';
import { ITranscriptStore } from '../domain/ports/ITranscriptStore';
import { ConsoleReporter } from '../infrastructure/logging/ConsoleReporter';
import { LocalTranscriptStore } from '../infrastructure/storage/LocalTranscriptStore';
import { WhisperTranscriptionClient } from '../infrastructure/transcription/WhisperTranscriptionClient';
import { AudioFileValidator } from '../infrastructure/validation/AudioFileValidator';
import { BatchTranscriptionOrchestrator } from './BatchTranscriptionOrchestrator';
import { TranscriptionService } from './services/TranscriptionService';

export interface TranscriberOverrides {
    /** Resolved credential; falls back to config.apiKey */
    apiKey?: string;
    client?: ITranscriptionClient;
    store?: ITranscriptStore;
    reporter?: IReporter;
}

export interface Transcriber {
    reporter: IReporter;
    validator: AudioFileValidator;
    store: ITranscriptStore;
    service: TranscriptionService;
    orchestrator: BatchTranscriptionOrchestrator;
}

export function createTranscriber(config: Config, overrides: TranscriberOverrides = {}): Transcriber {
    const reporter = overrides.reporter ?? new ConsoleReporter({
        showProgress: config.showProgress,
        useDecorativeOutput: config.useDecorativeOutput,
    });

    const client = overrides.client ?? new WhisperTranscriptionClient(overrides.apiKey || config.apiKey, {
        baseUrl: config.apiBaseUrl,
        model: config.transcriptionModel,
        timeoutMs: config.requestTimeoutMs,
    });

    const store = overrides.store ?? new LocalTranscriptStore(reporter);
    const validator = new AudioFileValidator(
        { supportedExtensions: config.supportedExtensions, maxFileSizeBytes: config.maxFileSizeBytes },
        reporter
    );

    const service = new TranscriptionService({
        validator,
        client,
        store,
        reporter,
        settings: {
            defaultLanguage: config.defaultLanguage,
            autoSaveTranscripts: config.autoSaveTranscripts,
            outputDirectory: config.outputDirectory,
            transcriptFileSuffix: config.transcriptFileSuffix,
        },
    });

    return {
        reporter,
        validator,
        store,
        service,
        orchestrator: new BatchTranscriptionOrchestrator(service, reporter),
    };
}
