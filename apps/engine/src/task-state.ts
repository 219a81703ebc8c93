import { TaskEntity, taskStatus } from './db/task.entity';
import { InvalidStateError } from './errors/queue.errors';

// Allowed moves outside of an explicit requeue.
const TRANSITIONS: Record<taskStatus, readonly taskStatus[]> = {
    [taskStatus.PENDING]: [taskStatus.RUNNING, taskStatus.CANCELLED],
    [taskStatus.RUNNING]: [taskStatus.COMPLETED, taskStatus.FAILED],
    // a failed task waiting out its backoff can still be cancelled
    [taskStatus.FAILED]: [taskStatus.PENDING, taskStatus.CANCELLED],
    [taskStatus.COMPLETED]: [],
    [taskStatus.CANCELLED]: [],
};

type TaskState = Pick<TaskEntity, 'status' | 'retry_at'>;

/**
 * completed and cancelled are always terminal; failed is terminal once no
 * retry is scheduled.
 */
export function isTerminal(task: TaskState): boolean {
    switch (task.status) {
        case taskStatus.COMPLETED:
        case taskStatus.CANCELLED:
            return true;
        case taskStatus.FAILED:
            return task.retry_at === null;
        default:
            return false;
    }
}

export function isTerminalStatus(status: taskStatus): boolean {
    return status === taskStatus.COMPLETED || status === taskStatus.CANCELLED || status === taskStatus.FAILED;
}

/**
 * `requeue` marks an explicit user request, the only way out of a terminal state.
 */
export function canTransition(task: TaskState, to: taskStatus, opts: { requeue?: boolean } = {}): boolean {
    if (opts.requeue) {
        return to === taskStatus.PENDING && isTerminal(task) && task.status !== taskStatus.COMPLETED;
    }
    if (task.status === taskStatus.FAILED && task.retry_at === null) {
        return false;
    }
    return TRANSITIONS[task.status].includes(to);
}

export function assertTransition(task: TaskState & { id: string }, to: taskStatus, opts: { requeue?: boolean } = {}): void {
    if (!canTransition(task, to, opts)) {
        const from = isTerminal(task) ? `terminal ${task.status}` : task.status;
        throw new InvalidStateError(`Task ${task.id} cannot move from ${from} to ${to}`);
    }
}
