/**
 * Command-line arguments for the transcribe script
 */

import { parseArgs } from 'util';
import { ConfigError } from './shared/errors';

export interface CliArgs {
    /** Prompt id; undefined means "ask" (or default when not on a TTY) */
    prompt?: string;
    audio?: string;
    output?: string;
    prompts?: string;
    help: boolean;
}

export const USAGE = `Usage: npm run transcribe -- [options]

Options:
  -p, --prompt <id>     Prompt template id (empty for the default)
      --audio <dir>     Folder with audio files (default ./Audio)
      --output <dir>    Folder for transcriptions (default ./Transcriptions)
      --prompts <dir>   Folder with prompt templates (default ./prompts)
  -h, --help            Show this help`;

export function parseCliArgs(argv: string[]): CliArgs {
    try {
        const { values } = parseArgs({
            args: argv,
            options: {
                prompt: { type: 'string', short: 'p' },
                audio: { type: 'string' },
                output: { type: 'string' },
                prompts: { type: 'string' },
                help: { type: 'boolean', short: 'h', default: false },
            },
            strict: true,
            allowPositionals: false,
        });
        return {
            prompt: values.prompt,
            audio: values.audio,
            output: values.output,
            prompts: values.prompts,
            help: values.help ?? false,
        };
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        throw new ConfigError(`${message}\n\n${USAGE}`, { cause: error });
    }
}
