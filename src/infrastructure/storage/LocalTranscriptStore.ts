import * as fs from 'fs';
import { ITranscriptStore } from '../../domain/ports/ITranscriptStore';
import { IReporter } from '../../domain/ports/IReporter';
import { describeError } from '../../domain/errors/TranscriberErrors';

/**
 * Writes transcripts to the local file system as UTF-8, overwriting.
 */
export class LocalTranscriptStore implements ITranscriptStore {
    constructor(private readonly reporter: IReporter) { }

    async save(text: string, destination: string): Promise<boolean> {
        try {
            await fs.promises.writeFile(destination, text, { encoding: 'utf-8', flag: 'w' });
        } catch (error) {
            this.reporter.error(`Error saving transcript: ${describeError(error)}`);
            return false;
        }
        this.reporter.progress('saved', `Transcript saved to: ${destination}`);
        return true;
    }
}
