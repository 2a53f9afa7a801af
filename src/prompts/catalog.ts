/**
 * Prompt catalog - discovers prompt templates in a folder
 *
 * Files are named {n}_{label}.{ext}, e.g. 1_standard.md. Anything else is skipped.
 * Adding a correctly named file is all it takes to offer a new style.
 */

import { Dirent } from 'fs';
import * as fs from 'fs/promises';
import * as path from 'path';
import { CatalogError, SelectionError, systemErrorCode } from '../shared/errors';
import { PromptCatalog, PromptCatalogLoader, PromptTemplate } from './types';

const HEADING = /^#+\s*(.*?)\s*#*$/;

interface TemplateName {
    id: string;
    label: string;
}

/**
 * Split "{n}_{label}.{ext}" into id and label; null if the name doesn't follow the convention
 */
export function parseTemplateFilename(filename: string): TemplateName | null {
    if (filename.startsWith('.')) return null;

    const stem = path.basename(filename, path.extname(filename));
    const separator = stem.indexOf('_');
    if (separator <= 0) return null;

    const prefix = stem.slice(0, separator);
    const label = stem.slice(separator + 1).trim();
    if (!/^\d+$/.test(prefix) || !label) return null;

    return { id: normalizeId(prefix), label };
}

/**
 * Build a template from file contents. Returns null when there is no instruction text.
 */
export function parseTemplate(name: TemplateName, content: string, source?: string): PromptTemplate | null {
    const lines = content.replace(/\r\n?/g, '\n').split('\n');
    const first = lines.findIndex(line => line.trim() !== '');
    if (first === -1) return null;

    const heading = HEADING.exec(lines[first].trim());
    let title = name.label.replace(/[_-]+/g, ' ').trim();
    let body = content.trim();

    if (heading) {
        if (heading[1]) title = heading[1];
        body = lines.slice(first + 1).join('\n').trim();
    }

    if (!body) return null;
    return { id: name.id, title, body, source };
}

/**
 * Loads templates from a prompts folder by filename convention
 */
export class FilePromptCatalog implements PromptCatalogLoader {
    constructor(private readonly directory: string) {}

    async load(): Promise<PromptCatalog> {
        let entries: Dirent[];
        try {
            entries = await fs.readdir(this.directory, { withFileTypes: true });
        } catch (error) {
            const code = systemErrorCode(error);
            const reason = code === 'ENOENT' ? 'does not exist' : `cannot be read (${code ?? 'unknown error'})`;
            throw new CatalogError(`Prompts folder ${this.directory} ${reason}`, { cause: error });
        }

        const templates: PromptTemplate[] = [];
        const seen = new Map<string, string>();

        for (const entry of entries) {
            if (!entry.isFile()) continue;

            const name = parseTemplateFilename(entry.name);
            if (!name) continue;

            const filePath = path.join(this.directory, entry.name);
            let content: string;
            try {
                content = await fs.readFile(filePath, 'utf-8');
            } catch (error) {
                throw new CatalogError(`Cannot read prompt template ${filePath}`, { cause: error });
            }
            const template = parseTemplate(name, content, filePath);
            if (!template) continue;

            const previous = seen.get(template.id);
            if (previous) {
                throw new CatalogError(`Duplicate prompt id ${template.id}: ${previous} and ${entry.name}`);
            }
            seen.set(template.id, entry.name);
            templates.push(template);
        }

        if (templates.length === 0) {
            throw new CatalogError(`No prompt templates found in ${this.directory} (expected files like 1_standard.md)`);
        }

        templates.sort((a, b) => Number(a.id) - Number(b.id));
        return Object.freeze(templates);
    }
}

/**
 * Default template: id "1", or the lowest id when there is no "1"
 */
export function defaultPrompt(catalog: PromptCatalog): PromptTemplate {
    const template = catalog.find(t => t.id === '1') ?? catalog[0];
    if (!template) {
        throw new CatalogError('Prompt catalog is empty');
    }
    return template;
}

/**
 * Pick a template by id. Empty input selects the default; unknown ids never fall back.
 */
export function selectPrompt(catalog: PromptCatalog, userInput?: string): PromptTemplate {
    const input = (userInput ?? '').trim();
    if (!input) return defaultPrompt(catalog);

    const id = /^\d+$/.test(input) ? normalizeId(input) : input;
    const template = catalog.find(t => t.id === id);
    if (!template) {
        const available = catalog.map(t => t.id).join(', ');
        throw new SelectionError(`Unknown prompt "${input}". Choose one of: ${available}`, input);
    }
    return template;
}

function normalizeId(digits: string): string {
    return String(parseInt(digits, 10));
}
