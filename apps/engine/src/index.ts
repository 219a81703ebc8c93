// public api for @promptqueue/engine
// usage:
//   const runtime = createRuntime(loadConfig());
//   const id = runtime.operations.add({ kind: 'send-prompt', payload: { prompt: 'hi' }, priority: 'high' });

export { loadConfig } from './config';
export type { AppConfig, QueueConfig, LlmConfig } from './config';
export { createRuntime } from './runtime';
export type { Runtime, RuntimeOverrides } from './runtime';

export { openDatabase, closeDatabase } from './db';
export { taskStatus, taskPriority } from './db/task.entity';
export type { TaskEntity, TaskErrorDetail } from './db/task.entity';
export { TaskRepository } from './repositories/task.repository';
export type { NewTask, TaskFilter, TaskMutation, QueueStats } from './repositories/task.repository';
export { isTerminal, canTransition, assertTransition } from './task-state';

export { QueueOperations } from './api/operations.service';
export type { AddTaskInput, ListTasksInput, TaskSummary, TaskDetail } from './api/operations.service';

export { QueueDaemon, TaskExecutor, Poller, Reaper, HeartbeatService } from './services';
export type { DaemonStatus, Outcome } from './services';
export { DaemonController } from './daemon/controller';
export { ProcessMarker } from './daemon/process-marker';
export { runDaemon } from './daemon/run';

export { calculateBackOff } from './utils/backoff';
export type { BackoffPolicy } from './utils/backoff';

export { createDefaultRegistry } from './handlers';
export type { LlmClient, LlmRequest, LlmCompletion } from './llm/llm-client';
export { OpenAICompatibleClient } from './llm/openai-client';

export {
    QueueError,
    ValidationError,
    NotFoundError,
    InvalidStateError,
    StoreError,
    ConfigError,
} from './errors/queue.errors';
