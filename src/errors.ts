/**
 * Error taxonomy for the catalog and favorites core.
 * Callers switch on the class (or `name`) rather than parsing messages.
 */

export class CatalogError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

/** The TMDB access credential is missing or still the placeholder. */
export class ConfigError extends CatalogError {}

/** Transport failure: DNS, refused connection, reset, timeout. */
export class NetworkError extends CatalogError {}

export class HttpStatusError extends CatalogError {
    readonly status: number;
    readonly reason: string;

    constructor(status: number, reason: string) {
        super(`TMDB API error ${status}${reason ? `: ${reason}` : ''}`);
        this.status = status;
        this.reason = reason;
    }
}

/** A payload is missing a required field or has a field of the wrong type. */
export class SchemaError extends CatalogError {
    readonly field: string;

    constructor(field: string, message?: string) {
        super(message ?? `Invalid or missing field "${field}"`);
        this.field = field;
    }
}

export type PersistenceOperation = 'read' | 'write';

export class PersistenceError extends CatalogError {
    readonly operation: PersistenceOperation;

    constructor(operation: PersistenceOperation, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.operation = operation;
    }
}

/** Wrap a storage failure, leaving an existing PersistenceError untouched. */
export function toPersistenceError(operation: PersistenceOperation, err: unknown): PersistenceError {
    if (err instanceof PersistenceError) return err;
    return new PersistenceError(operation, `Favorites ${operation} failed: ${describeError(err)}`, { cause: err });
}

export function describeError(err: unknown): string {
    if (err instanceof Error) return err.message;
    if (typeof err === 'string') return err;
    return String(err);
}
