import { strict as assert } from 'assert';
import { describe, it } from 'node:test';
import { GenerateContentParameters } from '@google/genai';
import { ContentGenerator, GeminiTranscriptionClient, toTranscriptionError } from '../gemini-client';
import { TranscriptionError } from '../../shared/errors';

const model = { name: 'gemini-2.5-pro', temperature: 0.1, maxOutputTokens: 4096 };

/**
 * Stands in for the SDK's models API
 */
class FakeModels implements ContentGenerator {
    requests: GenerateContentParameters[] = [];

    constructor(private readonly reply: () => Promise<{ text?: string }>) {}

    generateContent(params: GenerateContentParameters): Promise<{ text?: string }> {
        this.requests.push(params);
        return this.reply();
    }
}

function apiError(status: number, message: string): Error {
    return Object.assign(new Error(message), { status });
}

async function failureFor(error: unknown): Promise<TranscriptionError> {
    const client = new GeminiTranscriptionClient('test-secret', model, new FakeModels(() => Promise.reject(error)));
    try {
        await client.transcribe(Buffer.from('RIFF'), 'audio/wav', 'Transcribe');
    } catch (caught) {
        assert.ok(caught instanceof TranscriptionError);
        return caught;
    }
    assert.fail('expected transcribe to reject');
}

describe('GeminiTranscriptionClient', () => {
    it('sends the prompt and inline audio and returns trimmed text', async () => {
        const models = new FakeModels(async () => ({ text: '  Hello there.\n' }));
        const client = new GeminiTranscriptionClient('test-secret', model, models);

        const text = await client.transcribe(Buffer.from('RIFF'), 'audio/wav', 'Transcribe accurately.');

        assert.equal(text, 'Hello there.');
        assert.deepEqual(models.requests, [
            {
                model: 'gemini-2.5-pro',
                contents: [
                    {
                        role: 'user',
                        parts: [
                            { text: 'Transcribe accurately.' },
                            { inlineData: { mimeType: 'audio/wav', data: 'UklGRg==' } },
                        ],
                    },
                ],
                config: { temperature: 0.1, maxOutputTokens: 4096 },
            },
        ]);
    });

    it('treats missing or blank text as an empty response', async () => {
        for (const reply of [{}, { text: '   ' }]) {
            const client = new GeminiTranscriptionClient('test-secret', model, new FakeModels(async () => reply));
            await assert.rejects(client.transcribe(Buffer.from('x'), 'audio/mpeg', 'p'), (error: unknown) => {
                assert.ok(error instanceof TranscriptionError);
                assert.equal(error.reason, 'empty-response');
                return true;
            });
        }
    });

    it('classifies an invalid API key as auth', async () => {
        const failure = await failureFor(apiError(400, 'API key not valid. Please pass a valid API key.'));
        assert.equal(failure.reason, 'auth');
        assert.equal(failure.status, 400);
        assert.equal(failure.message, 'API key not valid. Please pass a valid API key.');
    });

    it('classifies remote statuses', async () => {
        assert.equal((await failureFor(apiError(403, 'Permission denied'))).reason, 'auth');
        assert.equal((await failureFor(apiError(413, 'Request too large'))).reason, 'payload-too-large');
        assert.equal((await failureFor(apiError(429, 'Resource has been exhausted'))).reason, 'quota');
        assert.equal((await failureFor(apiError(400, 'Invalid argument'))).reason, 'unknown');
    });

    it('classifies an oversized request rejected with 400 as payload-too-large', async () => {
        const failure = await failureFor(apiError(400, 'Request payload size exceeds the limit: 20971520 bytes.'));
        assert.equal(failure.reason, 'payload-too-large');
        assert.equal(failure.status, 400);
    });

    it('keeps the remote message for unclassified failures', async () => {
        const failure = await failureFor(apiError(500, 'Internal error encountered.'));
        assert.equal(failure.reason, 'unknown');
        assert.equal(failure.status, 500);
        assert.equal(failure.message, 'Internal error encountered.');
    });

    it('classifies connection failures as network', async () => {
        const cause = Object.assign(new Error('getaddrinfo ENOTFOUND example.invalid'), { code: 'ENOTFOUND' });
        const failure = await failureFor(new TypeError('fetch failed', { cause }));
        assert.equal(failure.reason, 'network');
        assert.equal(failure.status, undefined);
    });
});

describe('toTranscriptionError', () => {
    it('passes a TranscriptionError through unchanged', () => {
        const original = new TranscriptionError('Quota exceeded', 'quota', 429);
        assert.equal(toTranscriptionError(original), original);
    });

    it('wraps non-errors', () => {
        const failure = toTranscriptionError('boom');
        assert.equal(failure.reason, 'unknown');
        assert.equal(failure.message, 'boom');
    });
});
