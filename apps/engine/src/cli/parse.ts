import { TaskPayload } from '@promptqueue/sdk';
import { ValidationError } from '../errors/queue.errors';

const UNIT_MS: Record<string, number> = {
    s: 1000,
    m: 60_000,
    h: 60 * 60_000,
    d: 24 * 60 * 60_000,
    w: 7 * 24 * 60 * 60_000,
};

export function parseInteger(value: string, name: string, min = 0): number {
    const trimmed = value.trim();
    if (!/^-?\d+$/.test(trimmed)) {
        throw new ValidationError(`${name} must be an integer, got "${value}"`);
    }
    const parsed = Number(trimmed);
    if (parsed < min) {
        throw new ValidationError(`${name} must be >= ${min}, got ${parsed}`);
    }
    return parsed;
}

/** Accepts an ISO date/time or a relative age such as `30m`, `2h`, `7d`. */
export function parseTimePoint(value: string, name: string, now: number = Date.now()): Date {
    const relative = /^(\d+)\s*([smhdw])$/i.exec(value.trim());
    if (relative) {
        const [, amount, unit] = relative;
        return new Date(now - Number(amount) * UNIT_MS[unit.toLowerCase()]);
    }
    const parsed = Date.parse(value);
    if (Number.isNaN(parsed)) {
        throw new ValidationError(`${name} must be an ISO date or an age like 2h or 7d, got "${value}"`);
    }
    return new Date(parsed);
}

function isObject(value: unknown): value is TaskPayload {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function parsePayload(json: string): TaskPayload {
    let parsed: unknown;
    try {
        parsed = JSON.parse(json);
    } catch (err) {
        throw new ValidationError(`Payload is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
    }
    if (!isObject(parsed)) {
        throw new ValidationError('Payload must be a JSON object');
    }
    return parsed;
}
