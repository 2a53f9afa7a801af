/**
 * Audio file discovery - lists the audio files directly inside a folder
 */

import { Dirent, Stats } from 'fs';
import * as fs from 'fs/promises';
import * as path from 'path';
import { DiscoveryError, UnsupportedFormatError, systemErrorCode } from '../shared/errors';

/**
 * Supported audio file extensions and the mime type sent with each
 */
export const SUPPORTED_AUDIO_FORMATS: Readonly<Record<string, string>> = Object.freeze({
    '.mp3': 'audio/mpeg',
    '.wav': 'audio/wav',
    '.m4a': 'audio/mp4',
    '.flac': 'audio/flac',
    '.ogg': 'audio/ogg',
    '.webm': 'audio/webm',
    '.mp4': 'audio/mp4',
    '.aac': 'audio/aac',
});

export const SUPPORTED_AUDIO_EXTENSIONS = Object.keys(SUPPORTED_AUDIO_FORMATS);

export interface AudioFile {
    /** Filename including extension */
    name: string;

    /** Path inside the audio folder */
    path: string;

    /** Lower-cased extension with leading dot */
    extension: string;

    sizeBytes: number;
}

export function isSupportedAudio(filename: string): boolean {
    const ext = path.extname(filename).toLowerCase();
    return Object.prototype.hasOwnProperty.call(SUPPORTED_AUDIO_FORMATS, ext);
}

/**
 * Mime type for an extension (".MP3" and "mp3" both work)
 */
export function mimeTypeFor(extension: string): string {
    const normalized = extension.toLowerCase();
    const ext = normalized.startsWith('.') ? normalized : `.${normalized}`;
    if (!Object.prototype.hasOwnProperty.call(SUPPORTED_AUDIO_FORMATS, ext)) {
        throw new UnsupportedFormatError(extension);
    }
    return SUPPORTED_AUDIO_FORMATS[ext];
}

/**
 * Find all audio files in folder, sorted by filename. No recursion.
 */
export async function discoverAudioFiles(folder: string): Promise<AudioFile[]> {
    let entries: Dirent[];
    try {
        entries = await fs.readdir(folder, { withFileTypes: true });
    } catch (error) {
        const code = systemErrorCode(error);
        if (code === 'ENOENT') {
            throw new DiscoveryError(`Audio folder does not exist: ${folder}`, { cause: error });
        }
        if (code === 'ENOTDIR') {
            throw new DiscoveryError(`Audio folder is not a directory: ${folder}`, { cause: error });
        }
        throw new DiscoveryError(`Audio folder cannot be read: ${folder} (${code ?? 'unknown error'})`, { cause: error });
    }

    const files: AudioFile[] = [];
    for (const entry of entries) {
        if (!(entry.isFile() || entry.isSymbolicLink()) || entry.name.startsWith('.')) continue;
        if (!isSupportedAudio(entry.name)) continue;

        const filePath = path.join(folder, entry.name);
        // stat follows symlinks; entries that vanished or dangle are skipped
        let stats: Stats;
        try {
            stats = await fs.stat(filePath);
        } catch (error) {
            const code = systemErrorCode(error);
            if (code === 'ENOENT' || code === 'ELOOP') continue;
            throw new DiscoveryError(`Cannot read ${filePath} (${code ?? 'unknown error'})`, { cause: error });
        }
        if (!stats.isFile()) continue;

        files.push({
            name: entry.name,
            path: filePath,
            extension: path.extname(entry.name).toLowerCase(),
            sizeBytes: stats.size,
        });
    }

    return files.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
}
