/**
 * Transcription output - one .txt file per audio file, with a short metadata header
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { WriteError, describeError } from '../shared/errors';

export const HEADER_RULE = '='.repeat(50);

export interface TranscriptionMetadata {
    /** Model name, e.g. gemini-2.5-pro */
    model?: string;

    /** Prompt used, shown as "{id} - {title}" */
    prompt?: { id: string; title: string };

    transcribedAt: Date;
}

export interface TranscriptionDocument extends TranscriptionMetadata {
    originalFilename: string;
    text: string;
}

/**
 * Interview.MP3 -> Interview_transcription.txt
 */
export function deriveOutputFilename(originalFilename: string): string {
    const base = path.basename(originalFilename);
    const ext = path.extname(base);
    const stem = ext ? base.slice(0, -ext.length) : base;
    return `${stem}_transcription.txt`;
}

export function formatTranscription(doc: TranscriptionDocument): string {
    const header = [`Transcription of: ${doc.originalFilename}`];
    if (doc.model) header.push(`Generated using: Google Gemini (${doc.model})`);
    if (doc.prompt) header.push(`Prompt: ${doc.prompt.id} - ${doc.prompt.title}`);
    header.push(`Transcribed at: ${doc.transcribedAt.toISOString()}`);
    header.push(HEADER_RULE);

    return `${header.join('\n')}\n\n${doc.text}`;
}

/**
 * Write the transcription, creating the folder if needed and replacing any earlier file.
 * @returns the written path
 */
export async function writeTranscription(
    destinationDir: string,
    originalFilename: string,
    text: string,
    metadata: TranscriptionMetadata = { transcribedAt: new Date() }
): Promise<string> {
    const outputPath = path.join(destinationDir, deriveOutputFilename(originalFilename));

    try {
        await fs.mkdir(destinationDir, { recursive: true });
    } catch (error) {
        throw new WriteError(`Cannot create output folder ${destinationDir}: ${describeError(error)}`, outputPath, { cause: error });
    }

    const content = formatTranscription({ ...metadata, originalFilename, text });
    try {
        await fs.writeFile(outputPath, content, 'utf-8');
    } catch (error) {
        throw new WriteError(`Cannot write ${outputPath}: ${describeError(error)}`, outputPath, { cause: error });
    }

    return outputPath;
}
