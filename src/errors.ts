export type VacuumErrorCode =
    // Configuration errors; abort the run before any work
    | 'InvalidRoot'
    | 'InvalidPattern'
    | 'UsageError'
    // Per-file errors; the file is skipped, the run continues
    | 'MalformedSource'
    | 'IoFailure';

export interface VacuumErrorOptions {
    cause?: unknown;
    details?: Record<string, unknown>;
}

export class VacuumError extends Error {
    readonly code: VacuumErrorCode;
    readonly details?: Record<string, unknown>;

    constructor(code: VacuumErrorCode, message: string, options: VacuumErrorOptions = {}) {
        super(message, {cause: options.cause});
        this.name = this.constructor.name;
        this.code = code;
        this.details = options.details;
    }

    /** Fatal errors abort the whole run; the others only skip one file. */
    get isFatal() {
        return this.code === 'InvalidRoot' || this.code === 'InvalidPattern' || this.code === 'UsageError';
    }
}

/** A declaration's header or body never closes, or a block comment runs off the end of the file. */
export class MalformedSourceError extends VacuumError {
    constructor(readonly filename: string, message: string, readonly offset: number, readonly line: number) {
        super('MalformedSource', message, {details: {filename, offset, line}});
    }
}

export class InvalidRootError extends VacuumError {
    constructor(readonly root: string, message: string, options: VacuumErrorOptions = {}) {
        super('InvalidRoot', message, options);
    }
}

export class InvalidPatternError extends VacuumError {
    constructor(readonly pattern: string, cause: unknown) {
        super('InvalidPattern', `Invalid ignore pattern ${JSON.stringify(pattern)}: ${describeError(cause)}`, {cause});
    }
}

export class IoFailureError extends VacuumError {
    constructor(readonly filename: string, message: string, cause?: unknown) {
        super('IoFailure', cause === undefined ? message : `${message}: ${describeError(cause)}`, {cause, details: {filename}});
    }
}

export class UsageError extends VacuumError {
    constructor(message: string) {
        super('UsageError', message);
    }
}

export function describeError(e: unknown): string {
    return e instanceof Error ? e.message : String(e);
}
