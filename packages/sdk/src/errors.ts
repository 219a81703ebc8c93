import { types } from 'util';
import { ZodError } from 'zod';

export type FailureClassification = 'transient' | 'permanent' | 'cancelled' | 'timeout';

/** A failure worth retrying: timeouts, rate limits, dropped connections. */
export class TransientTaskError extends Error {
    readonly transient = true;

    constructor(
        message: string,
        public readonly classification: 'transient' | 'timeout' = 'transient',
        options?: ErrorOptions,
    ) {
        super(message, options);
        this.name = 'TransientTaskError';
    }
}

/** A failure that will not go away on retry: bad payload, unsupported kind. */
export class PermanentTaskError extends Error {
    readonly transient = false;

    constructor(
        message: string,
        public readonly classification: 'permanent' | 'cancelled' = 'permanent',
        options?: ErrorOptions,
    ) {
        super(message, options);
        this.name = 'PermanentTaskError';
    }
}

export interface ClassifiedError {
    message: string;
    name: string;
    classification: FailureClassification;
    retryable: boolean;
}

const TRANSIENT_ERRNO = new Set([
    'ECONNRESET',
    'ECONNREFUSED',
    'ETIMEDOUT',
    'EPIPE',
    'EAI_AGAIN',
    'ENOTFOUND',
    'UND_ERR_CONNECT_TIMEOUT',
    'UND_ERR_SOCKET',
]);

interface ErrorLike {
    name: string;
    message: string;
    code?: string;
}

// Errors raised by Node's own modules fail `instanceof Error` across VM
// contexts (Jest runs tests in one), so read the fields structurally.
function asErrorLike(err: unknown): ErrorLike | null {
    if (err instanceof Error || types.isNativeError(err)) {
        const code: unknown = Reflect.get(err, 'code');
        return { name: err.name, message: err.message, code: typeof code === 'string' ? code : undefined };
    }
    return null;
}

/**
 * Turns whatever a handler threw into a classified failure.
 * Unknown errors count as transient so they get the configured retries.
 */
export function classifyError(err: unknown): ClassifiedError {
    if (err instanceof PermanentTaskError) {
        return { message: err.message, name: err.name, classification: err.classification, retryable: false };
    }
    if (err instanceof TransientTaskError) {
        return { message: err.message, name: err.name, classification: err.classification, retryable: true };
    }
    if (err instanceof ZodError) {
        const detail = err.issues.map(issue => `${issue.path.join('.') || '<root>'}: ${issue.message}`).join('; ');
        return { message: `Invalid payload: ${detail}`, name: 'ValidationError', classification: 'permanent', retryable: false };
    }
    const error = asErrorLike(err);
    if (error) {
        if (error.name === 'TimeoutError') {
            return { message: error.message, name: error.name, classification: 'timeout', retryable: true };
        }
        if (error.code && TRANSIENT_ERRNO.has(error.code)) {
            return { message: `${error.code}: ${error.message}`, name: error.name, classification: 'transient', retryable: true };
        }
        return { message: error.message, name: error.name, classification: 'transient', retryable: true };
    }
    return { message: String(err), name: 'Error', classification: 'transient', retryable: true };
}
