import { Transcriber } from '../../application/TranscriberFactory';
import { BatchResult } from '../../domain/entities/BatchResult';
import { combineTranscripts } from '../../domain/services/TranscriptCombiner';

export interface BatchCommandOptions {
    files: string[];
    language?: string;
    output?: string;
}

/**
 * Non-interactive run over files given on the command line.
 * Per-file failures are reported; the command itself still succeeds.
 */
export async function runBatchCommand(
    transcriber: Transcriber,
    options: BatchCommandOptions
): Promise<BatchResult> {
    const { reporter, orchestrator, store } = transcriber;

    const transcriptions = await orchestrator.transcribeMany(options.files, options.language);
    reporter.success(`Successfully transcribed ${transcriptions.size} of ${options.files.length} files`);

    for (const [key, text] of transcriptions) {
        reporter.info(`\n${'='.repeat(20)} ${key} ${'='.repeat(20)}`);
        reporter.info(text);
    }

    if (options.output && transcriptions.size > 0) {
        await store.save(combineTranscripts(transcriptions), options.output);
    }

    return transcriptions;
}
