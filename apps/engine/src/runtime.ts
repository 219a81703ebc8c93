import { HandlerRegistry } from '@promptqueue/sdk';
import { QueueOperations } from './api/operations.service';
import { AppConfig } from './config';
import { closeDatabase, Db, openDatabase } from './db';
import { createDefaultRegistry } from './handlers';
import { LlmClient } from './llm/llm-client';
import { OpenAICompatibleClient } from './llm/openai-client';
import { TaskRepository } from './repositories/task.repository';

export interface Runtime {
    config: AppConfig;
    db: Db;
    taskRepo: TaskRepository;
    registry: HandlerRegistry;
    operations: QueueOperations;
    close(): void;
}

export interface RuntimeOverrides {
    llm?: LlmClient;
    registry?: HandlerRegistry;
}

/** Wires store, handlers and operations for one process. */
export function createRuntime(config: AppConfig, overrides: RuntimeOverrides = {}): Runtime {
    const db = openDatabase(config.databaseFile);
    const taskRepo = new TaskRepository(db);
    const registry = overrides.registry ?? createDefaultRegistry({
        llm: overrides.llm ?? new OpenAICompatibleClient(config.llm),
    });
    const operations = new QueueOperations(taskRepo, {
        registry,
        defaultMaxAttempts: config.queue.defaultMaxAttempts,
    });

    return {
        config,
        db,
        taskRepo,
        registry,
        operations,
        close: () => closeDatabase(db),
    };
}
