/**
 * Gemini transcription client
 *
 * One generateContent call per file: the prompt text plus the audio as inline data.
 * No retries; failures are classified and passed up to the caller.
 */

import { GoogleGenAI, GenerateContentParameters } from '@google/genai';
import { ModelConfig } from '../config/config';
import { TranscriptionError, TranscriptionFailureReason, describeError, systemErrorCode } from '../shared/errors';

export interface TranscriptionClient {
    transcribe(audio: Buffer, mimeType: string, prompt: string): Promise<string>;
}

/**
 * The part of the Gemini SDK the client uses
 */
export interface ContentGenerator {
    generateContent(params: GenerateContentParameters): Promise<{ text?: string }>;
}

const NETWORK_ERROR_CODES = new Set([
    'ECONNREFUSED',
    'ECONNRESET',
    'ENOTFOUND',
    'EAI_AGAIN',
    'ETIMEDOUT',
    'UND_ERR_CONNECT_TIMEOUT',
    'UND_ERR_SOCKET',
]);

export class GeminiTranscriptionClient implements TranscriptionClient {
    private readonly models: ContentGenerator;

    constructor(
        apiKey: string,
        private readonly model: ModelConfig,
        models?: ContentGenerator
    ) {
        this.models = models ?? new GoogleGenAI({ apiKey }).models;
    }

    async transcribe(audio: Buffer, mimeType: string, prompt: string): Promise<string> {
        let text: string | undefined;
        try {
            const response = await this.models.generateContent({
                model: this.model.name,
                contents: [
                    {
                        role: 'user',
                        parts: [
                            { text: prompt },
                            { inlineData: { mimeType, data: audio.toString('base64') } },
                        ],
                    },
                ],
                config: {
                    temperature: this.model.temperature,
                    maxOutputTokens: this.model.maxOutputTokens,
                },
            });
            text = response.text;
        } catch (error) {
            throw toTranscriptionError(error);
        }

        const trimmed = text?.trim();
        if (!trimmed) {
            throw new TranscriptionError('Model returned no text', 'empty-response');
        }
        return trimmed;
    }
}

/**
 * Map an SDK or fetch failure onto a TranscriptionError, keeping the remote message
 */
export function toTranscriptionError(error: unknown): TranscriptionError {
    if (error instanceof TranscriptionError) return error;

    const status = extractStatusCode(error);
    const message = describeError(error);
    return new TranscriptionError(message, classify(status, message, error), status, { cause: error });
}

function classify(status: number | undefined, message: string, error: unknown): TranscriptionFailureReason {
    if (status === 401 || status === 403) return 'auth';
    if (status === 400 && /api[ _-]?key/i.test(message)) return 'auth';
    if (status === 413) return 'payload-too-large';
    if (status === 400 && /payload size|exceeds the limit/i.test(message)) return 'payload-too-large';
    if (status === 429) return 'quota';
    if (status === undefined && isNetworkFailure(error)) return 'network';
    return 'unknown';
}

function extractStatusCode(error: unknown): number | undefined {
    if (!error || typeof error !== 'object') return undefined;
    if ('status' in error && typeof error.status === 'number') return error.status;
    return undefined;
}

function isNetworkFailure(error: unknown): boolean {
    const code = systemErrorCode(error);
    if (code && NETWORK_ERROR_CODES.has(code)) return true;

    if (error instanceof Error) {
        const causeCode = systemErrorCode(error.cause);
        if (causeCode && NETWORK_ERROR_CODES.has(causeCode)) return true;
        // undici reports connection problems as TypeError('fetch failed')
        return error.name === 'TypeError' && /fetch failed/i.test(error.message);
    }
    return false;
}
