/**
 * Errors surfaced by the store and the operations API.
 * Each carries a stable code and the exit status the CLI reports for it.
 */
export abstract class QueueError extends Error {
    abstract readonly code: string;
    abstract readonly exitCode: number;

    toJSON(): { code: string; message: string } {
        return { code: this.code, message: this.message };
    }
}

export class ValidationError extends QueueError {
    readonly code = 'VALIDATION_ERROR';
    readonly exitCode = 2;

    constructor(message: string) {
        super(message);
        this.name = 'ValidationError';
    }
}

export class NotFoundError extends QueueError {
    readonly code = 'NOT_FOUND';
    readonly exitCode = 3;

    constructor(public readonly taskId: string) {
        super(`Task ${taskId} not found`);
        this.name = 'NotFoundError';
    }
}

export class InvalidStateError extends QueueError {
    readonly code = 'INVALID_STATE';
    readonly exitCode = 4;

    constructor(message: string) {
        super(message);
        this.name = 'InvalidStateError';
    }
}

export class StoreError extends QueueError {
    readonly code = 'STORE_ERROR';
    readonly exitCode = 5;

    constructor(public readonly operation: string, options?: ErrorOptions) {
        super(`Task store ${operation} failed: ${describe(options?.cause)}`, options);
        this.name = 'StoreError';
    }

    // Domain errors raised inside a store call pass through untouched.
    static wrap(operation: string, err: unknown): QueueError {
        if (err instanceof QueueError) return err;
        return new StoreError(operation, { cause: err });
    }
}

export class ConfigError extends QueueError {
    readonly code = 'CONFIG_ERROR';
    readonly exitCode = 6;

    constructor(message: string) {
        super(message);
        this.name = 'ConfigError';
    }
}

function describe(cause: unknown): string {
    return cause instanceof Error ? cause.message : String(cause);
}
