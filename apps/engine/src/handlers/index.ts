import { createRegistry, HandlerRegistry } from '@promptqueue/sdk';
import { ideaHandlers } from './idea.handlers';
import { promptHandlers } from './prompt.handlers';
import { subtaskHandlers } from './subtask.handlers';
import { HandlerDeps } from './types';

/** Registry with every built-in LLM task kind. */
export function createDefaultRegistry(deps: HandlerDeps): HandlerRegistry {
    return createRegistry([
        ...promptHandlers(deps),
        ...ideaHandlers(deps),
        ...subtaskHandlers(deps),
    ]);
}

export type { HandlerDeps, LlmTaskResult } from './types';
export type { SubtasksResult, SubtaskOutcome } from './subtask.handlers';
