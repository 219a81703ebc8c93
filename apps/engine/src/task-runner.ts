import { ClassifiedError, SerializationError, classifyError } from '@promptqueue/sdk';
import { TaskEntity } from './db/task.entity';
import { TaskRepository } from './repositories/task.repository';
import { TaskExecutor } from './services/task-executor';
import { HeartbeatService } from './services/heartbeat.service';
import { BackoffPolicy, calculateBackOff } from './utils/backoff';

const TAG = '[engine]';

export interface TaskRunnerDeps {
    taskRepo: Pick<TaskRepository, 'complete' | 'fail'>;
    executor: Pick<TaskExecutor, 'execute'>;
    heartbeat: Pick<HeartbeatService, 'start' | 'stop'>;
    workerId: string;
    backoff: BackoffPolicy;
    clock?: () => number;
}

/**
 * Runs one claimed task and records the outcome. Store errors propagate to the
 * poller, which logs them and keeps looping; the expired claim is then
 * recovered by the reaper.
 */
export async function runTask(deps: TaskRunnerDeps, task: TaskEntity): Promise<void> {
    const { taskRepo, executor, heartbeat, workerId } = deps;
    const clock = deps.clock ?? Date.now;

    console.log(`${TAG} processing task ${task.id} (${task.kind}, attempt ${task.attempts}/${task.max_attempts})`);
    const controller = new AbortController();
    heartbeat.start(task.id, controller);

    try {
        const outcome = await executor.execute(task, controller.signal);

        if (outcome.success) {
            try {
                if (taskRepo.complete(task.id, workerId, outcome.result)) {
                    console.log(`${TAG} completed task ${task.id}`);
                } else {
                    console.warn(`${TAG} task ${task.id} finished but its claim was lost; result dropped`);
                }
                return;
            } catch (err) {
                if (!(err instanceof SerializationError)) throw err;
                // an unstorable result will not get smaller on retry
                recordFailure(deps, task, { ...classifyError(err), classification: 'permanent', retryable: false }, clock);
                return;
            }
        }

        recordFailure(deps, task, outcome.error, clock);
    } finally {
        heartbeat.stop(task.id);
    }
}

function recordFailure(deps: TaskRunnerDeps, task: TaskEntity, error: ClassifiedError, clock: () => number): void {
    const detail = { message: error.message, name: error.name, classification: error.classification };
    const retry = error.retryable && task.attempts < task.max_attempts;
    const retryAt = retry ? new Date(clock() + calculateBackOff(task.attempts, deps.backoff)) : null;

    const recorded = deps.taskRepo.fail(task.id, deps.workerId, detail, retryAt);
    if (!recorded) {
        console.warn(`${TAG} task ${task.id} failed but its claim was lost`);
    } else if (retryAt) {
        console.log(`${TAG} task ${task.id} retry scheduled at ${retryAt.toISOString()}`);
    } else {
        console.error(`${TAG} task ${task.id} failed permanently: ${error.message}`);
    }
}
