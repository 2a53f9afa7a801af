/**
 * Configuration for the transcriber
 *
 * Non-secret settings live in config.json (optional), the API key in
 * GEMINI_API_KEY (environment or an untracked .env file).
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import * as dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigError, systemErrorCode } from '../shared/errors';

export const CREDENTIAL_ENV_VAR = 'GEMINI_API_KEY';

// ============ SCHEMA ============

const foldersSchema = z.object({
    audio: z.string().min(1).default('./Audio'),
    prompts: z.string().min(1).default('./prompts'),
    transcriptions: z.string().min(1).default('./Transcriptions'),
    logs: z.string().min(1).default('./logs'),
});

const modelSchema = z.object({
    name: z.string().min(1).default('gemini-2.5-pro'),
    temperature: z.number().min(0).max(2).default(0.1),
    maxOutputTokens: z.number().int().positive().default(4096),
});

const configSchema = z.object({
    folders: foldersSchema.default({}),
    model: modelSchema.default({}),
    /** Files above this size are rejected before upload */
    maxFileSizeMb: z.number().positive().default(20),
    /** Fallback for GEMINI_API_KEY; prefer .env */
    geminiApiKey: z.string().optional(),
});

export type FoldersConfig = z.infer<typeof foldersSchema>;
export type ModelConfig = z.infer<typeof modelSchema>;
export type AppConfig = z.infer<typeof configSchema>;

export interface ResolvedPaths {
    audio: string;
    prompts: string;
    transcriptions: string;
    logs: string;
}

const CONFIG_FILE = path.join(process.cwd(), 'config.json');

// ============ LOAD ============

/**
 * Defaults for every setting
 */
export function defaultConfig(): AppConfig {
    return configSchema.parse({});
}

/**
 * Validate raw (already parsed) config data against the schema
 */
export function parseConfig(raw: unknown, source = 'config.json'): AppConfig {
    const parsed = configSchema.safeParse(raw);
    if (!parsed.success) {
        const issues = parsed.error.issues
            .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
            .join('; ');
        throw new ConfigError(`Invalid ${source}: ${issues}`);
    }
    return parsed.data;
}

/**
 * Load app config from config.json (or return defaults when the file is absent)
 */
export async function loadConfig(configFile: string = CONFIG_FILE): Promise<AppConfig> {
    let data: string;
    try {
        data = await fs.readFile(configFile, 'utf-8');
    } catch (error) {
        if (systemErrorCode(error) === 'ENOENT') {
            return defaultConfig();
        }
        throw new ConfigError(`Cannot read ${configFile}`, { cause: error });
    }

    let raw: unknown;
    try {
        raw = JSON.parse(data);
    } catch (error) {
        throw new ConfigError(`${path.basename(configFile)} is not valid JSON`, { cause: error });
    }
    return parseConfig(raw, path.basename(configFile));
}

// ============ RESOLVED PATHS ============

/**
 * Get resolved absolute paths from config
 */
export function getResolvedPaths(config: AppConfig, root: string = process.cwd()): ResolvedPaths {
    return {
        audio: path.resolve(root, config.folders.audio),
        prompts: path.resolve(root, config.folders.prompts),
        transcriptions: path.resolve(root, config.folders.transcriptions),
        logs: path.resolve(root, config.folders.logs),
    };
}

// ============ CREDENTIAL ============

/**
 * Load a local .env file into process.env (existing variables win)
 */
export function loadEnvFile(envFile: string = path.join(process.cwd(), '.env')): void {
    dotenv.config({ path: envFile });
}

/**
 * Resolve the Gemini API key: environment first, then config.json
 */
export function loadCredential(config: AppConfig, env: NodeJS.ProcessEnv = process.env): string {
    const candidates = [env[CREDENTIAL_ENV_VAR], config.geminiApiKey];
    for (const candidate of candidates) {
        const value = candidate?.trim();
        if (value) {
            return value;
        }
    }
    throw new ConfigError(
        `${CREDENTIAL_ENV_VAR} not found. Set it in the environment or in a .env file in ${process.cwd()}`
    );
}
