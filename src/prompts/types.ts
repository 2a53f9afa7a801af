/**
 * Prompt template types
 */

export interface PromptTemplate {
    /** Numeric id from the filename prefix, without leading zeros ("1", "2", ...) */
    id: string;

    /** Heading of the template, or the filename label when there is none */
    title: string;

    /** Instruction text sent verbatim to the model */
    body: string;

    /** File the template was read from */
    source?: string;
}

/** Ordered by numeric id, immutable for the run */
export type PromptCatalog = readonly PromptTemplate[];

/**
 * Anything that can produce a catalog of prompt templates
 */
export interface PromptCatalogLoader {
    load(): Promise<PromptCatalog>;
}

/**
 * Where the user's prompt choice comes from (console, CLI argument, ...)
 */
export interface PromptSource {
    /** Whether a rejected answer can be asked for again */
    readonly interactive: boolean;

    /** Returns a prompt id, or an empty string for the default */
    getSelection(catalog: PromptCatalog): Promise<string>;

    /** Called with the rejection message before asking again */
    reject?(message: string): void;
}
