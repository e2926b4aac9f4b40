/**
 * Raw audio handed to a transcription backend.
 */
export interface AudioPayload {
    data: Buffer;
    /** Used by the backend to infer the container format */
    fileName: string;
}

/**
 * ITranscriptionClient - Port for audio transcription services.
 * Implementations: WhisperTranscriptionClient
 */
export interface ITranscriptionClient {
    /**
     * Transcribes audio bytes to plain text.
     * @param language ISO-639-1 hint; omitted lets the backend detect it
     * @throws TranscriptionError on any backend or transport failure
     */
    transcribe(audio: AudioPayload, language?: string): Promise<string>;
}
