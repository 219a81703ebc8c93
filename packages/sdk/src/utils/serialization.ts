import superjson from 'superjson';

// Payloads and results share one row; keep either well under SQLite's page churn.
export const MAX_VALUE_BYTES = 1024 * 1024; // 1MB

export class SerializationError extends Error {
    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
        this.name = 'SerializationError';
    }
}

function formatMb(bytes: number): string {
    return (bytes / 1024 / 1024).toFixed(2);
}

/**
 * Encodes a task payload or result for storage. Dates, Maps, Sets and
 * bigints survive the round trip. `label` names the value in errors.
 */
export function serialize(value: unknown, label = 'value', maxBytes = MAX_VALUE_BYTES): string | null {
    if (value === undefined) return null;

    let encoded: string;
    try {
        encoded = superjson.stringify(value);
    } catch (err) {
        throw new SerializationError(
            `Failed to serialize ${label}: ${err instanceof Error ? err.message : String(err)}`,
            { cause: err },
        );
    }

    const size = Buffer.byteLength(encoded);
    if (size > maxBytes) {
        throw new SerializationError(
            `${label} size exceeds maximum limit of ${formatMb(maxBytes)}MB. Current size: ${formatMb(size)}MB`,
        );
    }
    return encoded;
}

export function deserialize(encoded: string | null | undefined, label = 'value'): unknown {
    if (encoded === null || encoded === undefined || encoded.trim() === '') return undefined;

    try {
        return superjson.parse<unknown>(encoded);
    } catch (err) {
        throw new SerializationError(
            `Failed to deserialize ${label}: ${err instanceof Error ? err.message : String(err)}`,
            { cause: err },
        );
    }
}
