/**
 * Error taxonomy for a transcription run
 *
 * Fatal errors stop the run before any audio is processed.
 * Per-file errors are caught by the orchestrator and folded into the summary.
 */

export type ErrorCode =
    | 'CONFIG'
    | 'CATALOG'
    | 'SELECTION'
    | 'DISCOVERY'
    | 'TRANSCRIPTION'
    | 'UNSUPPORTED_FORMAT'
    | 'WRITE';

/**
 * Why a remote transcription call failed
 */
export type TranscriptionFailureReason =
    | 'network'
    | 'auth'
    | 'quota'
    | 'payload-too-large'
    | 'empty-response'
    | 'unknown';

export class TranscriberError extends Error {
    constructor(
        message: string,
        readonly code: ErrorCode,
        readonly fatal: boolean,
        options?: { cause?: unknown }
    ) {
        super(message, options);
        this.name = new.target.name;
    }
}

export class ConfigError extends TranscriberError {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, 'CONFIG', true, options);
    }
}

export class CatalogError extends TranscriberError {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, 'CATALOG', true, options);
    }
}

export class SelectionError extends TranscriberError {
    constructor(message: string, readonly input: string) {
        super(message, 'SELECTION', true);
    }
}

export class DiscoveryError extends TranscriberError {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, 'DISCOVERY', true, options);
    }
}

export class TranscriptionError extends TranscriberError {
    constructor(
        message: string,
        readonly reason: TranscriptionFailureReason,
        readonly status?: number,
        options?: { cause?: unknown }
    ) {
        super(message, 'TRANSCRIPTION', false, options);
    }
}

export class UnsupportedFormatError extends TranscriberError {
    constructor(readonly extension: string) {
        super(`Unsupported audio format: ${extension || '(no extension)'}`, 'UNSUPPORTED_FORMAT', false);
    }
}

export class WriteError extends TranscriberError {
    constructor(message: string, readonly targetPath: string, options?: { cause?: unknown }) {
        super(message, 'WRITE', false, options);
    }
}

/**
 * Render any thrown value as a single line
 */
export function describeError(error: unknown): string {
    if (error instanceof TranscriptionError) {
        const status = error.status !== undefined ? ` ${error.status}` : '';
        return `[${error.reason}${status}] ${error.message}`;
    }
    if (error instanceof Error) {
        return error.message.replace(/\s*\n\s*/g, ' ').trim() || error.name;
    }
    return String(error);
}

/**
 * Node system error code (ENOENT, EACCES, ...) if present
 */
export function systemErrorCode(error: unknown): string | undefined {
    if (error && typeof error === 'object' && 'code' in error && typeof error.code === 'string') {
        return error.code;
    }
    return undefined;
}
