/**
 * Error types
 *
 * Only failures that abort a whole build get a dedicated class. Everything
 * scoped to one file, one manifest or one import is logged and skipped by the
 * code that hit it.
 */

export type DepscopeErrorCode =
    | 'WORKER_POOL'
    | 'ROOT_ENUMERATION'
    | 'CONFIG';

export class DepscopeError extends Error {
    constructor(
        public readonly code: DepscopeErrorCode,
        message: string,
        options?: { cause?: unknown }
    ) {
        super(message, options);
        this.name = new.target.name;
    }
}

/**
 * The extraction pool could not be created with the requested size.
 */
export class WorkerPoolError extends DepscopeError {
    constructor(public readonly workers: unknown, options?: { cause?: unknown }) {
        super('WORKER_POOL', `Cannot create worker pool with ${String(workers)} workers`, options);
    }
}

/**
 * The root exists but its entries cannot be listed.
 */
export class RootEnumerationError extends DepscopeError {
    constructor(public readonly root: string, options?: { cause?: unknown }) {
        super('ROOT_ENUMERATION', `Cannot enumerate root directory: ${root}`, options);
    }
}

/**
 * A configuration value failed validation.
 */
export class ConfigError extends DepscopeError {
    constructor(public readonly field: string, detail: string) {
        super('CONFIG', `Invalid configuration for "${field}": ${detail}`);
    }
}

/**
 * Message text of anything thrown.
 */
export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

/**
 * The errno-style code of a Node.js system error ('ENOENT', 'EACCES', ...).
 */
export function errorCode(error: unknown): string | undefined {
    if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
        return error.code;
    }
    return undefined;
}
