import { join } from 'path';
import { z } from 'zod';
import { defineHandler, HandlerDefinition, PermanentTaskError } from '@promptqueue/sdk';
import { readPayloadFile, writeResultFile } from './files';
import { cleanResponse, combinePrompt, fillTemplate, loadTemplate } from './templates';
import { HandlerDeps } from './types';

const subtaskList = z.array(z.object({
    id: z.union([z.string().min(1), z.number().int()]),
    description: z.string().min(1),
})).min(1);

// what `breakdown` produces: the objective and its ordered sub-tasks
export const taskFileSchema = z.object({
    task: z.string().min(1).optional(),
    subtasks: subtaskList,
});

export const executeSubtasksSchema = z.object({
    // the main objective the sub-tasks belong to
    task: z.string().min(1).optional(),
    subtasks: subtaskList.optional(),
    // a task list file read when the task runs, instead of inline subtasks
    taskFile: z.string().min(1).optional(),
    // each completed sub-task is also written to <outputDir>/task_<id>_result.md
    outputDir: z.string().min(1).optional(),
    model: z.string().min(1).optional(),
    temperature: z.number().min(0).max(2).optional(),
}).refine(payload => (payload.subtasks === undefined) !== (payload.taskFile === undefined), {
    message: 'Provide exactly one of subtasks or taskFile',
});

export interface SubtaskOutcome {
    id: string | number;
    status: 'completed' | 'failed';
    content?: string;
    outputFile?: string;
    error?: string;
}

async function loadTaskFile(path: string): Promise<z.infer<typeof taskFileSchema>> {
    const raw = await readPayloadFile(path, 'task file');
    let parsed: unknown;
    try {
        parsed = JSON.parse(raw);
    } catch (err) {
        throw new PermanentTaskError(`Task file ${path} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
    }
    const checked = taskFileSchema.safeParse(parsed);
    if (!checked.success) {
        const detail = checked.error.issues.map(issue => `${issue.path.join('.') || '<root>'}: ${issue.message}`).join('; ');
        throw new PermanentTaskError(`Task file ${path} is not a task list: ${detail}`);
    }
    return checked.data;
}

export interface SubtasksResult {
    model: string;
    total: number;
    successful: number;
    failed: number;
    details: SubtaskOutcome[];
}

/**
 * Runs a breakdown's sub-tasks one after another, each refined then sent.
 * A failing sub-task is recorded and the rest continue; only when every
 * sub-task fails does the task itself fail (and get retried).
 */
export function subtaskHandlers({ llm, promptsDir }: HandlerDeps): HandlerDefinition[] {
    return [
        defineHandler({
            kind: 'execute-subtasks',
            description: 'Refine and execute each sub-task of a breakdown in order',
            schema: executeSubtasksSchema,
            handler: async ({ payload, signal }): Promise<SubtasksResult> => {
                const list = payload.taskFile !== undefined
                    ? await loadTaskFile(payload.taskFile)
                    : { task: payload.task, subtasks: payload.subtasks ?? [] };
                const objective = payload.task ?? list.task;
                const details: SubtaskOutcome[] = [];
                let model = payload.model ?? '';
                let lastError: unknown = null;

                for (const subtask of list.subtasks) {
                    signal.throwIfAborted();
                    const subPrompt = `Sub-Task ${subtask.id}: ${subtask.description}`;
                    const prompt = objective
                        ? combinePrompt(fillTemplate(loadTemplate('execute-subtask', promptsDir), { objective }), subPrompt)
                        : subPrompt;

                    try {
                        const refined = await llm.complete({
                            prompt: combinePrompt(loadTemplate('refine-prompt', promptsDir), prompt),
                            model: payload.model,
                            temperature: payload.temperature,
                            signal,
                        });
                        const executed = await llm.complete({
                            prompt: cleanResponse(refined.content),
                            model: payload.model,
                            temperature: payload.temperature,
                            signal,
                        });
                        model = executed.model;
                        const outcome: SubtaskOutcome = { id: subtask.id, status: 'completed', content: cleanResponse(executed.content) };
                        if (payload.outputDir !== undefined) {
                            outcome.outputFile = await writeResultFile(
                                join(payload.outputDir, `task_${subtask.id}_result.md`),
                                outcome.content ?? '',
                            );
                        }
                        details.push(outcome);
                    } catch (err) {
                        if (signal.aborted) throw err;
                        lastError = err;
                        details.push({ id: subtask.id, status: 'failed', error: err instanceof Error ? err.message : String(err) });
                    }
                }

                const successful = details.filter(d => d.status === 'completed').length;
                if (successful === 0) {
                    throw lastError;
                }
                return { model, total: details.length, successful, failed: details.length - successful, details };
            },
        }),
    ];
}
