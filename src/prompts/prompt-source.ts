/**
 * Prompt sources - how the user picks a transcription style
 */

import * as readline from 'readline';
import { SelectionError } from '../shared/errors';
import { selectPrompt, defaultPrompt } from './catalog';
import { PromptCatalog, PromptSource, PromptTemplate } from './types';

export const MAX_SELECTION_ATTEMPTS = 3;

/**
 * Render the catalog as a numbered menu
 */
export function formatCatalog(catalog: PromptCatalog): string {
    const fallback = defaultPrompt(catalog);
    return catalog
        .map(t => `  ${t.id}. ${t.title}${t === fallback ? ' (default)' : ''}`)
        .join('\n');
}

/**
 * Asks on the terminal
 */
export class ConsolePromptSource implements PromptSource {
    readonly interactive = true;

    constructor(
        private readonly input: NodeJS.ReadableStream = process.stdin,
        private readonly output: NodeJS.WritableStream = process.stdout
    ) {}

    getSelection(catalog: PromptCatalog): Promise<string> {
        this.output.write(`\n📝 Available prompt templates:\n${formatCatalog(catalog)}\n\n`);
        const rl = readline.createInterface({ input: this.input, output: this.output });
        return new Promise((resolve, reject) => {
            let answered = false;
            // Input ended (Ctrl-D) before a line came in
            rl.once('close', () => {
                if (!answered) reject(new SelectionError('No prompt selected', ''));
            });
            rl.question('Select a prompt (press Enter for default): ', (answer) => {
                answered = true;
                rl.close();
                resolve(answer.trim());
            });
        });
    }

    reject(message: string): void {
        this.output.write(`❌ ${message}\n`);
    }
}

/**
 * Uses a value given up front (e.g. --prompt 2); empty means default
 */
export class ArgumentPromptSource implements PromptSource {
    readonly interactive = false;

    constructor(private readonly value: string = '') {}

    async getSelection(): Promise<string> {
        return this.value.trim();
    }
}

/**
 * Ask the source until it gives a valid id. Non-interactive sources get one try.
 */
export async function resolvePrompt(
    source: PromptSource,
    catalog: PromptCatalog,
    maxAttempts: number = MAX_SELECTION_ATTEMPTS
): Promise<PromptTemplate> {
    const attempts = source.interactive ? Math.max(1, maxAttempts) : 1;
    let lastError: SelectionError | undefined;

    for (let attempt = 1; attempt <= attempts; attempt++) {
        const answer = await source.getSelection(catalog);
        try {
            return selectPrompt(catalog, answer);
        } catch (error) {
            if (!(error instanceof SelectionError)) throw error;
            lastError = error;
            if (attempt < attempts) source.reject?.(error.message);
        }
    }

    throw lastError ?? new SelectionError('No prompt selected', '');
}
