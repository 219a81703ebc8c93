import { z } from 'zod';
import { deserialize, TaskPayload } from '@promptqueue/sdk';
import { PRIORITY_RANK, TaskEntity, TaskErrorDetail, TaskRow, taskPriority, taskStatus } from './task.entity';

const STATUSES: readonly string[] = Object.values(taskStatus);
const PRIORITIES: readonly string[] = Object.values(taskPriority);

const PRIORITY_BY_RANK: readonly taskPriority[] = [
    taskPriority.LOW,
    taskPriority.NORMAL,
    taskPriority.HIGH,
    taskPriority.URGENT,
];

const errorDetailSchema = z.object({
    message: z.string(),
    name: z.string(),
    classification: z.enum(['transient', 'permanent', 'cancelled', 'timeout']),
});

export function isTaskStatus(value: string): value is taskStatus {
    return STATUSES.includes(value);
}

export function isTaskPriority(value: string): value is taskPriority {
    return PRIORITIES.includes(value);
}

export function rankOf(priority: taskPriority): number {
    return PRIORITY_RANK[priority];
}

function priorityOf(rank: number): taskPriority {
    const priority = PRIORITY_BY_RANK[rank];
    if (priority === undefined) {
        throw new Error(`Unknown priority rank ${rank}`);
    }
    return priority;
}

function isPayload(value: unknown): value is TaskPayload {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toDate(ms: number | null): Date | null {
    return ms === null ? null : new Date(ms);
}

export function encodeError(error: TaskErrorDetail | null): string | null {
    return error === null ? null : JSON.stringify(error);
}

function decodeError(raw: string | null): TaskErrorDetail | null {
    if (raw === null) return null;
    return errorDetailSchema.parse(JSON.parse(raw));
}

export function toEntity(row: TaskRow): TaskEntity {
    if (!isTaskStatus(row.status)) {
        throw new Error(`Task ${row.id} has unknown status "${row.status}"`);
    }
    const payload = deserialize(row.payload, 'payload') ?? {};
    if (!isPayload(payload)) {
        throw new Error(`Task ${row.id} payload is not an object`);
    }

    return {
        id: row.id,
        kind: row.kind,
        payload,
        priority: priorityOf(row.priority),
        status: row.status,
        attempts: row.attempts,
        max_attempts: row.max_attempts,
        result: deserialize(row.result, 'result'),
        error: decodeError(row.error),
        lock_owner: row.lock_owner,
        lock_expiry: toDate(row.lock_expiry),
        retry_at: toDate(row.retry_at),
        cancel_requested: row.cancel_requested === 1,
        created_at: new Date(row.created_at),
        updated_at: new Date(row.updated_at),
        started_at: toDate(row.started_at),
        finished_at: toDate(row.finished_at),
    };
}
