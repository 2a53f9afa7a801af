/**
 * Transcription run
 *
 * credential -> prompt catalog -> prompt selection -> discovery -> transcribe + write each file.
 * Everything up to discovery is fatal; after that a failing file is recorded and the run moves on.
 */

import * as fs from 'fs/promises';
import { AppConfig, ModelConfig, ResolvedPaths, loadCredential } from './config/config';
import { AudioFile, SUPPORTED_AUDIO_EXTENSIONS, discoverAudioFiles, mimeTypeFor } from './audio/discover';
import { FilePromptCatalog } from './prompts/catalog';
import { resolvePrompt } from './prompts/prompt-source';
import { PromptCatalogLoader, PromptSource, PromptTemplate } from './prompts/types';
import { GeminiTranscriptionClient, TranscriptionClient } from './transcription/gemini-client';
import { HEADER_RULE, writeTranscription } from './output/writer';
import { ErrorCode, TranscriberError, TranscriptionError, describeError } from './shared/errors';
import { Logger } from './shared/run-logger';

const BYTES_PER_MB = 1024 * 1024;

/**
 * Bytes the audio and prompt take in the request; inline audio travels as base64
 */
export function estimateRequestBytes(audioBytes: number, prompt: string): number {
    return Math.ceil(audioBytes / 3) * 4 + Buffer.byteLength(prompt, 'utf-8');
}

export interface ErrorInfo {
    code: ErrorCode | 'UNEXPECTED';
    message: string;
}

/** Exactly one of text/error is set */
export type TranscriptionResult =
    | { sourceFile: AudioFile; promptUsed: PromptTemplate; text: string; error?: undefined }
    | { sourceFile: AudioFile; promptUsed: PromptTemplate; text?: undefined; error: ErrorInfo };

export interface FailedFile {
    file: string;
    error: ErrorInfo;
}

export interface SucceededFile {
    file: string;
    outputPath: string;
}

export interface RunSummary {
    prompt: PromptTemplate;
    total: number;
    succeeded: SucceededFile[];
    failed: FailedFile[];
    outputDir: string;
}

export type ClientFactory = (apiKey: string, model: ModelConfig) => TranscriptionClient;

export interface RunOptions {
    config: AppConfig;
    paths: ResolvedPaths;
    promptSource: PromptSource;
    logger: Logger;
    env?: NodeJS.ProcessEnv;
    /** Defaults to the prompts folder */
    catalogLoader?: PromptCatalogLoader;
    /** Defaults to the Gemini client */
    createClient?: ClientFactory;
    now?: () => Date;
}

const defaultClientFactory: ClientFactory = (apiKey, model) => new GeminiTranscriptionClient(apiKey, model);

export function toErrorInfo(error: unknown): ErrorInfo {
    return {
        code: error instanceof TranscriberError ? error.code : 'UNEXPECTED',
        message: describeError(error),
    };
}

/**
 * Read, check and transcribe a single file. Never throws.
 */
export async function transcribeFile(
    file: AudioFile,
    prompt: PromptTemplate,
    client: TranscriptionClient,
    maxFileSizeMb: number
): Promise<TranscriptionResult> {
    try {
        const mimeType = mimeTypeFor(file.extension);

        const requestBytes = estimateRequestBytes(file.sizeBytes, prompt.body);
        if (requestBytes > maxFileSizeMb * BYTES_PER_MB) {
            const sizeMb = (requestBytes / BYTES_PER_MB).toFixed(1);
            throw new TranscriptionError(
                `Request would be ${sizeMb} MB once encoded, above the ${maxFileSizeMb} MB upload limit`,
                'payload-too-large'
            );
        }

        const audio = await fs.readFile(file.path);
        const text = await client.transcribe(audio, mimeType, prompt.body);
        return { sourceFile: file, promptUsed: prompt, text };
    } catch (error) {
        return { sourceFile: file, promptUsed: prompt, error: toErrorInfo(error) };
    }
}

export async function runTranscription(options: RunOptions): Promise<RunSummary> {
    const { config, paths, promptSource, logger } = options;
    const now = options.now ?? (() => new Date());

    // Init: the only precondition checked before touching any file
    const apiKey = loadCredential(config, options.env);
    logger.log('✅ API key found');

    const catalogLoader = options.catalogLoader ?? new FilePromptCatalog(paths.prompts);
    const catalog = await catalogLoader.load();
    logger.log(`📚 Loaded ${catalog.length} prompt template(s)`);

    const prompt = await resolvePrompt(promptSource, catalog);
    logger.log(`📝 Using prompt ${prompt.id}: ${prompt.title}`);

    logger.log(`📁 Scanning: ${paths.audio}`);
    const files = await discoverAudioFiles(paths.audio);

    const summary: RunSummary = {
        prompt,
        total: files.length,
        succeeded: [],
        failed: [],
        outputDir: paths.transcriptions,
    };

    if (files.length === 0) {
        logger.warn('No supported audio files found.');
        logger.log(`   Supported formats: ${SUPPORTED_AUDIO_EXTENSIONS.join(', ')}`);
        return summary;
    }

    logger.log(`📄 Found ${files.length} audio file(s) to transcribe:`);
    for (const file of files) {
        logger.log(`   - ${file.name}`);
    }
    logger.log('');

    const client = (options.createClient ?? defaultClientFactory)(apiKey, config.model);

    for (const file of files) {
        logger.log(`🎧 Transcribing: ${file.name}...`);
        const result = await transcribeFile(file, prompt, client, config.maxFileSizeMb);

        if (result.error) {
            summary.failed.push({ file: file.name, error: result.error });
            logger.error(`${file.name}: ${result.error.message}`);
            continue;
        }

        try {
            const outputPath = await writeTranscription(paths.transcriptions, file.name, result.text, {
                model: config.model.name,
                prompt: { id: prompt.id, title: prompt.title },
                transcribedAt: now(),
            });
            summary.succeeded.push({ file: file.name, outputPath });
            logger.log(`   ✅ Saved: ${outputPath} (${result.text.length} chars)`);
        } catch (error) {
            const info = toErrorInfo(error);
            summary.failed.push({ file: file.name, error: info });
            logger.error(`${file.name}: ${info.message}`);
        }
    }

    return summary;
}

export function formatSummary(summary: RunSummary): string {
    const lines = [
        HEADER_RULE,
        'TRANSCRIPTION SUMMARY',
        HEADER_RULE,
        `Total files processed: ${summary.total}`,
        `Successful transcriptions: ${summary.succeeded.length}`,
        `Failed transcriptions: ${summary.failed.length}`,
    ];

    for (const failure of summary.failed) {
        lines.push(`   - ${failure.file}: ${failure.error.message}`);
    }

    if (summary.succeeded.length > 0) {
        lines.push('', `Transcriptions saved in ${summary.outputDir}`);
    }
    return lines.join('\n');
}

/**
 * 0 when nothing failed (including an empty folder), 2 when any file failed
 */
export function exitCodeFor(summary: RunSummary): number {
    return summary.failed.length > 0 ? 2 : 0;
}
