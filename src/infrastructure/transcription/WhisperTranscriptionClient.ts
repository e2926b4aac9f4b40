import axios from 'axios';
import FormData from 'form-data';
import * as path from 'path';
import { AudioPayload, ITranscriptionClient } from '../../domain/ports/ITranscriptionClient';
import { ConfigurationError, TranscriptionError, describeError } from '../../domain/errors/TranscriberErrors';

export interface WhisperClientOptions {
    baseUrl?: string;
    model?: string;
    timeoutMs?: number;
}

/**
 * Whisper-based transcription client.
 * Uses the /v1/audio/transcriptions endpoint with response_format=text.
 * One request per call; failures are reported, never retried.
 */
export class WhisperTranscriptionClient implements ITranscriptionClient {
    private readonly apiKey: string;
    private readonly baseUrl: string;
    private readonly model: string;
    private readonly timeoutMs: number;

    constructor(apiKey: string, options: WhisperClientOptions = {}) {
        if (!apiKey) {
            throw new ConfigurationError('OpenAI API key is required');
        }
        this.apiKey = apiKey;
        this.baseUrl = (options.baseUrl || 'https://api.openai.com').replace(/\/+$/, '');
        this.model = options.model || 'whisper-1';
        this.timeoutMs = options.timeoutMs || 300000;
    }

    async transcribe(audio: AudioPayload, language?: string): Promise<string> {
        const formData = new FormData();
        formData.append('file', audio.data, {
            filename: audio.fileName,
            contentType: this.getMimeType(audio.fileName),
        });
        formData.append('model', this.model);
        formData.append('response_format', 'text');
        if (language) {
            formData.append('language', language);
        }

        let data: unknown;
        try {
            const response = await axios.post(`${this.baseUrl}/v1/audio/transcriptions`, formData, {
                headers: {
                    ...formData.getHeaders(),
                    Authorization: `Bearer ${this.apiKey}`,
                },
                responseType: 'text',
                timeout: this.timeoutMs,
                maxContentLength: Infinity,
                maxBodyLength: Infinity,
            });
            data = response.data;
        } catch (error) {
            if (axios.isAxiosError(error)) {
                const message = this.extractBackendMessage(error.response?.data) || error.message;
                throw new TranscriptionError(`Transcription failed: ${message}`, error.response?.status);
            }
            throw new TranscriptionError(
                `Transcription failed: ${describeError(error)}`
            );
        }

        if (typeof data !== 'string') {
            throw new TranscriptionError('Transcription failed: backend returned a non-text response');
        }
        return data.trim();
    }

    /**
     * Pulls `error.message` out of an OpenAI-style JSON error body.
     */
    private extractBackendMessage(body: unknown): string | null {
        let parsed: unknown = body;
        if (typeof body === 'string') {
            try {
                parsed = JSON.parse(body);
            } catch {
                return body.trim() || null;
            }
        }
        if (typeof parsed === 'object' && parsed !== null && 'error' in parsed) {
            const inner = parsed.error;
            if (typeof inner === 'object' && inner !== null && 'message' in inner && typeof inner.message === 'string') {
                return inner.message;
            }
        }
        return null;
    }

    private getMimeType(fileName: string): string {
        const mimeTypes: Record<string, string> = {
            mp3: 'audio/mpeg',
            mpeg: 'audio/mpeg',
            mpga: 'audio/mpeg',
            mp4: 'audio/mp4',
            m4a: 'audio/mp4',
            wav: 'audio/wav',
            webm: 'audio/webm',
        };
        const extension = path.extname(fileName).slice(1).toLowerCase();
        return mimeTypes[extension] || 'application/octet-stream';
    }
}
