#!/usr/bin/env node
/**
 * TRANSCRIBE script - Transcribe every audio file in ./Audio with Gemini
 * Run: npm run transcribe -- [--prompt <id>]
 *
 * Writes {name}_transcription.txt files to ./Transcriptions and a run log to ./logs.
 */

import * as path from 'path';
import { loadConfig, getResolvedPaths, loadEnvFile, CREDENTIAL_ENV_VAR } from './config/config';
import { parseCliArgs, USAGE } from './cli';
import { runTranscription, formatSummary, exitCodeFor } from './orchestrator';
import { ArgumentPromptSource, ConsolePromptSource } from './prompts/prompt-source';
import { PromptSource } from './prompts/types';
import { ConfigError, TranscriberError, describeError } from './shared/errors';
import { RunLogger } from './shared/run-logger';

async function main(): Promise<number> {
    const args = parseCliArgs(process.argv.slice(2));
    if (args.help) {
        console.log(USAGE);
        return 0;
    }

    loadEnvFile();
    const config = await loadConfig();
    const root = process.cwd();
    const resolved = getResolvedPaths(config, root);
    const paths = {
        ...resolved,
        audio: args.audio ? path.resolve(root, args.audio) : resolved.audio,
        transcriptions: args.output ? path.resolve(root, args.output) : resolved.transcriptions,
        prompts: args.prompts ? path.resolve(root, args.prompts) : resolved.prompts,
    };

    const logger = new RunLogger(paths.logs);
    logger.log(`🎙️ Audio Transcription using Google Gemini (${config.model.name})`);
    logger.log('='.repeat(50));

    const promptSource: PromptSource = args.prompt === undefined && process.stdin.isTTY
        ? new ConsolePromptSource()
        : new ArgumentPromptSource(args.prompt);

    let exitCode: number;
    try {
        const summary = await runTranscription({ config, paths, promptSource, logger });
        logger.log('');
        logger.log(formatSummary(summary));
        exitCode = exitCodeFor(summary);
    } catch (error) {
        logger.error(describeError(error));
        if (error instanceof ConfigError) {
            logger.log(`\nTo set your API key, create a .env file containing ${CREDENTIAL_ENV_VAR}=<your key>`);
            logger.log('Get a key from https://aistudio.google.com/app/apikey');
        }
        if (!(error instanceof TranscriberError)) {
            console.error(error);
        }
        exitCode = 1;
    }

    const logFile = await logger.save();
    console.log(`\n📄 Log saved to: ${logFile}`);
    return exitCode;
}

main()
    .then((code) => {
        process.exitCode = code;
    })
    .catch((error: unknown) => {
        console.error(`❌ ${describeError(error)}`);
        process.exitCode = 1;
    });
