import {
    classifyError,
    ClassifiedError,
    HandlerRegistry,
    PermanentTaskError,
    TransientTaskError,
} from '@promptqueue/sdk';
import { TaskEntity } from '../db/task.entity';

const TAG = '[executor]';

export type Outcome =
    | { success: true; result: unknown }
    | { success: false; error: ClassifiedError };

type ExecutableTask = Pick<TaskEntity, 'id' | 'kind' | 'payload' | 'attempts'>;

/**
 * Dispatches a claimed task to the handler registered for its kind.
 * Never throws: whatever the handler does ends up as an Outcome.
 */
export class TaskExecutor {
    constructor(private readonly registry: HandlerRegistry) { }

    async execute(task: ExecutableTask, signal?: AbortSignal): Promise<Outcome> {
        const definition = this.registry.get(task.kind);
        if (!definition) {
            return this.failure(task, new PermanentTaskError(`No handler registered for kind "${task.kind}"`));
        }

        const controller = new AbortController();
        const forwardAbort = () => controller.abort(signal?.reason);
        if (signal?.aborted) {
            forwardAbort();
        } else {
            signal?.addEventListener('abort', forwardAbort, { once: true });
        }

        let timer: NodeJS.Timeout | null = null;
        try {
            const payload = definition.schema.parse(task.payload);

            const run = definition.handler({
                taskId: task.id,
                kind: task.kind,
                payload,
                attempt: task.attempts,
                signal: controller.signal,
            });

            const stopped = new Promise<never>((_, reject) => {
                const onAbort = () => reject(abortReason(controller.signal));
                if (controller.signal.aborted) onAbort();
                else controller.signal.addEventListener('abort', onAbort, { once: true });
            });

            const timeoutMs = definition.timeoutMs;
            if (timeoutMs !== undefined) {
                timer = setTimeout(
                    () => controller.abort(new TransientTaskError(`Handler timed out after ${timeoutMs}ms`, 'timeout')),
                    timeoutMs,
                );
            }

            // the handler may ignore its signal, so the race is what actually stops waiting
            const result = await Promise.race([run, stopped]);
            return { success: true, result };
        } catch (err) {
            return this.failure(task, controller.signal.aborted ? abortReason(controller.signal) : err);
        } finally {
            if (timer) clearTimeout(timer);
            signal?.removeEventListener('abort', forwardAbort);
        }
    }

    private failure(task: ExecutableTask, err: unknown): Outcome {
        const error = classifyError(err);
        console.warn(`${TAG} task ${task.id} (${task.kind}) failed [${error.classification}]: ${error.message}`);
        return { success: false, error };
    }
}

function abortReason(signal: AbortSignal): unknown {
    const reason: unknown = signal.reason;
    if (reason instanceof TransientTaskError || reason instanceof PermanentTaskError) {
        return reason;
    }
    return new PermanentTaskError('Stop requested while the task was running', 'cancelled', { cause: reason });
}
