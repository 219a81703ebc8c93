import type { FailureClassification, TaskPayload } from '@promptqueue/sdk';

/**
 * Lifecycle states for queued tasks.
 * Tasks progress: PENDING → RUNNING → COMPLETED/FAILED, or PENDING → CANCELLED.
 * A FAILED task with retry_at set is waiting for its backoff to elapse.
 */
export enum taskStatus {
    PENDING = 'pending',
    RUNNING = 'running',
    COMPLETED = 'completed',
    FAILED = 'failed',
    CANCELLED = 'cancelled'
}

export enum taskPriority {
    LOW = 'low',
    NORMAL = 'normal',
    HIGH = 'high',
    URGENT = 'urgent'
}

// Stored rank; the queue index orders by it descending.
export const PRIORITY_RANK: Record<taskPriority, number> = {
    [taskPriority.LOW]: 0,
    [taskPriority.NORMAL]: 1,
    [taskPriority.HIGH]: 2,
    [taskPriority.URGENT]: 3,
};

export interface TaskErrorDetail {
    message: string;
    name: string;
    classification: FailureClassification;
}

/**
 * A queued unit of LLM work as the rest of the engine sees it.
 */
export interface TaskEntity {
    id: string;
    kind: string;
    payload: TaskPayload;
    priority: taskPriority;
    status: taskStatus;
    attempts: number;
    max_attempts: number;
    result: unknown;
    error: TaskErrorDetail | null;
    lock_owner: string | null;
    lock_expiry: Date | null;  // For dead daemon detection
    retry_at: Date | null;
    cancel_requested: boolean;
    created_at: Date;
    updated_at: Date;
    started_at: Date | null;
    finished_at: Date | null;
}

/** Raw row shape of the tasks table; timestamps are epoch milliseconds. */
export interface TaskRow {
    seq: number;
    id: string;
    kind: string;
    payload: string;
    priority: number;
    status: string;
    attempts: number;
    max_attempts: number;
    result: string | null;
    error: string | null;
    lock_owner: string | null;
    lock_expiry: number | null;
    retry_at: number | null;
    cancel_requested: number;
    created_at: number;
    updated_at: number;
    started_at: number | null;
    finished_at: number | null;
}
