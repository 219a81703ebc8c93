import { classifyError, HandlerRegistry, TaskPayload } from '@promptqueue/sdk';
import { TaskEntity, TaskErrorDetail, taskPriority, taskStatus } from '../db/task.entity';
import { isTaskPriority, isTaskStatus } from '../db/task.mapper';
import { InvalidStateError, NotFoundError, ValidationError } from '../errors/queue.errors';
import { QueueStats, TaskFilter, TaskRepository } from '../repositories/task.repository';
import { assertTransition, isTerminal } from '../task-state';

const DAY_MS = 24 * 60 * 60 * 1000;

export interface AddTaskInput {
    kind: string;
    payload?: TaskPayload;
    priority?: taskPriority | string;
    maxAttempts?: number;
}

export interface ListTasksInput {
    status?: string | string[];
    priority?: string | string[];
    kind?: string | string[];
    createdAfter?: Date;
    createdBefore?: Date;
    // every match when omitted
    limit?: number;
    offset?: number;
}

export interface TaskSummary {
    id: string;
    kind: string;
    priority: taskPriority;
    status: taskStatus;
    attempts: number;
    maxAttempts: number;
    createdAt: Date;
    updatedAt: Date;
}

export interface TaskDetail extends TaskSummary {
    // omitted unless verbose
    payload?: TaskPayload;
    // undefined until the task completes
    result: unknown;
    error: TaskErrorDetail | null;
    retryAt: Date | null;
    cancelRequested: boolean;
    startedAt: Date | null;
    finishedAt: Date | null;
    lockOwner: string | null;
    lockExpiry: Date | null;
}

export interface OperationsOptions {
    // when present, kinds and payloads are checked at submission
    registry?: HandlerRegistry;
    defaultMaxAttempts?: number;
}

export function toSummary(task: TaskEntity): TaskSummary {
    return {
        id: task.id,
        kind: task.kind,
        priority: task.priority,
        status: task.status,
        attempts: task.attempts,
        maxAttempts: task.max_attempts,
        createdAt: task.created_at,
        updatedAt: task.updated_at,
    };
}

/**
 * What the CLI and library callers use. Validates input, then delegates to the
 * store; never runs task logic.
 */
export class QueueOperations {
    constructor(
        private readonly taskRepo: TaskRepository,
        private readonly options: OperationsOptions = {},
    ) { }

    add(input: AddTaskInput): string {
        const kind = input.kind.trim();
        if (kind === '') {
            throw new ValidationError('Task kind is required');
        }
        const priority = parsePriority(input.priority ?? taskPriority.NORMAL);
        const maxAttempts = input.maxAttempts ?? this.options.defaultMaxAttempts ?? 3;
        if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
            throw new ValidationError(`max_attempts must be an integer >= 1, got ${maxAttempts}`);
        }

        const payload = input.payload ?? {};
        const { registry } = this.options;
        if (registry) {
            const definition = registry.get(kind);
            if (!definition) {
                throw new ValidationError(`Unknown task kind "${kind}". Known kinds: ${registry.list().join(', ')}`);
            }
            const checked = definition.schema.safeParse(payload);
            if (!checked.success) {
                throw new ValidationError(classifyError(checked.error).message);
            }
        }

        const task = this.taskRepo.create({ kind, payload, priority, maxAttempts });
        return task.id;
    }

    list(input: ListTasksInput = {}): TaskSummary[] {
        const filter: TaskFilter = {
            createdAfter: input.createdAfter,
            createdBefore: input.createdBefore,
            limit: input.limit,
            offset: input.offset,
        };
        if (input.status !== undefined) filter.status = toList(input.status).map(parseStatus);
        if (input.priority !== undefined) filter.priority = toList(input.priority).map(parsePriority);
        if (input.kind !== undefined) filter.kind = toList(input.kind);
        if (input.createdAfter && input.createdBefore && input.createdAfter >= input.createdBefore) {
            throw new ValidationError('createdAfter must be earlier than createdBefore');
        }

        return this.taskRepo.list(filter).map(toSummary);
    }

    status(id: string, verbose = false): TaskDetail {
        const task = this.taskRepo.get(id);
        const detail: TaskDetail = {
            ...toSummary(task),
            result: task.result,
            error: task.error,
            retryAt: task.retry_at,
            cancelRequested: task.cancel_requested,
            startedAt: task.started_at,
            finishedAt: task.finished_at,
            lockOwner: task.lock_owner,
            lockExpiry: task.lock_expiry,
        };
        if (verbose) {
            detail.payload = task.payload;
        }
        return detail;
    }

    /** Refuses pending and running tasks unless forced. */
    remove(id: string, force = false): boolean {
        const removed = this.taskRepo.delete(id, (current) => {
            if (force) return;
            if (current.status === taskStatus.PENDING || current.status === taskStatus.RUNNING) {
                throw new InvalidStateError(
                    `Task ${id} is ${current.status}; use force to remove it anyway`,
                );
            }
        });
        if (!removed) throw new NotFoundError(id);
        return true;
    }

    /**
     * Pending (or waiting to retry) tasks are cancelled outright. A running task
     * only gets its stop flag raised and stays running until the handler yields.
     */
    cancel(id: string): TaskSummary {
        const task = this.taskRepo.update(id, (current) => {
            if (current.status === taskStatus.RUNNING) {
                return { cancelRequested: true };
            }
            assertTransition(current, taskStatus.CANCELLED);
            return { status: taskStatus.CANCELLED, retryAt: null };
        });
        return toSummary(task);
    }

    /** Explicit requeue of a terminal failed or cancelled task with a fresh attempt budget. */
    retry(id: string): TaskSummary {
        const task = this.taskRepo.update(id, (current) => {
            if (!isTerminal(current)) {
                throw new InvalidStateError(`Task ${id} is ${current.status} and not terminal; nothing to retry`);
            }
            assertTransition(current, taskStatus.PENDING, { requeue: true });
            return {
                status: taskStatus.PENDING,
                attempts: 0,
                error: null,
                result: undefined,
                retryAt: null,
                cancelRequested: false,
            };
        });
        return toSummary(task);
    }

    stats(): QueueStats {
        return this.taskRepo.stats();
    }

    /** Deletes terminal tasks that finished more than `olderThanMs` ago. */
    purge(olderThanMs: number, now: number = Date.now()): number {
        if (!Number.isFinite(olderThanMs) || olderThanMs < 0) {
            throw new ValidationError('olderThan must be a non-negative duration');
        }
        return this.taskRepo.purge(new Date(now - olderThanMs));
    }

    purgeDays(days: number, now: number = Date.now()): number {
        return this.purge(days * DAY_MS, now);
    }
}

export function parsePriority(value: string): taskPriority {
    const normalized = value.trim().toLowerCase();
    if (!isTaskPriority(normalized)) {
        throw new ValidationError(`Invalid priority "${value}". Use one of: low, normal, high, urgent`);
    }
    return normalized;
}

export function parseStatus(value: string): taskStatus {
    const normalized = value.trim().toLowerCase();
    if (!isTaskStatus(normalized)) {
        throw new ValidationError(`Invalid status "${value}". Use one of: pending, running, completed, failed, cancelled`);
    }
    return normalized;
}

function toList(value: string | string[]): string[] {
    const items = Array.isArray(value) ? value : value.split(',');
    return items.map(item => item.trim()).filter(item => item !== '');
}
