import { z } from 'zod';
import { defineHandler, HandlerDefinition } from '@promptqueue/sdk';
import { LlmCompletion } from '../llm/llm-client';
import { collectContext, fileContextFields, readPayloadFile, writeResultFile } from './files';
import { cleanResponse, combinePrompt, loadTemplate } from './templates';
import { HandlerDeps, LlmTaskResult } from './types';

const model = z.string().min(1).optional();
const temperature = z.number().min(0).max(2).optional();
const outputFile = z.string().min(1).optional();

export const sendPromptSchema = z.object({
    prompt: z.string().min(1),
    model,
    temperature,
    maxTokens: z.number().int().positive().optional(),
    context: z.array(z.string()).optional(),
    ...fileContextFields,
    outputFile,
});

export const refineSchema = z.object({
    prompt: z.string().min(1),
    instructions: z.string().min(1).optional(),
    model,
    context: z.array(z.string()).optional(),
    ...fileContextFields,
    outputFile,
});

export const refineAndSendSchema = z.object({
    prompt: z.string().min(1),
    instructions: z.string().min(1).optional(),
    refinementModel: model,
    executionModel: model,
    temperature,
});

export const breakdownSchema = z.object({
    task: z.string().min(1).optional(),
    // read when the task runs, instead of an inline `task`
    taskFile: z.string().min(1).optional(),
    model,
    context: z.array(z.string()).optional(),
    ...fileContextFields,
    outputFile,
}).refine(payload => (payload.task === undefined) !== (payload.taskFile === undefined), {
    message: 'Provide exactly one of task or taskFile',
});

async function finish(completion: LlmCompletion, file: string | undefined): Promise<LlmTaskResult> {
    const result: LlmTaskResult = { content: cleanResponse(completion.content), model: completion.model };
    if (file !== undefined) {
        result.outputFile = await writeResultFile(file, result.content);
    }
    return result;
}

export function promptHandlers({ llm, promptsDir }: HandlerDeps): HandlerDefinition[] {
    const refine = async (
        prompt: string,
        instructions: string | undefined,
        opts: { model?: string; context?: string[]; signal: AbortSignal },
    ): Promise<LlmCompletion> => {
        const combined = combinePrompt(instructions ?? loadTemplate('refine-prompt', promptsDir), prompt);
        return llm.complete({ prompt: combined, ...opts });
    };

    return [
        defineHandler({
            kind: 'send-prompt',
            description: 'Send a prompt to the model and store the answer',
            schema: sendPromptSchema,
            handler: async ({ payload, signal }): Promise<LlmTaskResult> => {
                const completion = await llm.complete({
                    prompt: payload.prompt,
                    model: payload.model,
                    temperature: payload.temperature,
                    maxTokens: payload.maxTokens,
                    context: await collectContext(payload),
                    signal,
                });
                return finish(completion, payload.outputFile);
            },
        }),
        defineHandler({
            kind: 'refine',
            description: 'Rewrite a prompt so a model can act on it',
            schema: refineSchema,
            handler: async ({ payload, signal }) => finish(
                await refine(payload.prompt, payload.instructions, {
                    model: payload.model,
                    context: await collectContext(payload),
                    signal,
                }),
                payload.outputFile,
            ),
        }),
        defineHandler({
            kind: 'refine-and-send',
            description: 'Refine a prompt, then send the refined prompt',
            schema: refineAndSendSchema,
            handler: async ({ payload, signal }): Promise<LlmTaskResult> => {
                const refined = await refine(payload.prompt, payload.instructions, {
                    model: payload.refinementModel,
                    signal,
                });
                const completion = await llm.complete({
                    prompt: cleanResponse(refined.content),
                    model: payload.executionModel,
                    temperature: payload.temperature,
                    signal,
                });
                return { content: cleanResponse(completion.content), model: completion.model };
            },
        }),
        defineHandler({
            kind: 'breakdown',
            description: 'Split a task into ordered sub-tasks',
            schema: breakdownSchema,
            handler: async ({ payload, signal }) => {
                const task = payload.taskFile !== undefined
                    ? await readPayloadFile(payload.taskFile, 'task file')
                    : payload.task ?? '';
                const completion = await refine(task, loadTemplate('breakdown', promptsDir), {
                    model: payload.model,
                    context: await collectContext(payload),
                    signal,
                });
                return finish(completion, payload.outputFile);
            },
        }),
    ];
}
