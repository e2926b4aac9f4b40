/**
 * ITranscriptStore - Port for persisting transcript text.
 */
export interface ITranscriptStore {
    /**
     * Writes text to destination, replacing any existing content.
     * Resolves false on failure; never rejects.
     */
    save(text: string, destination: string): Promise<boolean>;
}
