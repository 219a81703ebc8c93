import { z } from 'zod';
import { defineHandler, HandlerDefinition } from '@promptqueue/sdk';
import { cleanResponse, combinePrompt, fillTemplate, loadTemplate } from './templates';
import { HandlerDeps, LlmTaskResult } from './types';

export const ideaGenerationSchema = z.object({
    topic: z.string().min(1),
    count: z.number().int().min(1).max(50).default(5),
    model: z.string().min(1).optional(),
    temperature: z.number().min(0).max(2).optional(),
});

export const mergeIdeasSchema = z.object({
    documents: z.array(z.object({
        identifier: z.string().min(1),
        content: z.string(),
    })).min(1),
    model: z.string().min(1).optional(),
});

export function formatDocuments(documents: Array<{ identifier: string; content: string }>): string {
    return documents
        .map(doc => `<document identifier="${doc.identifier}">\n${doc.content.trim()}\n</document>`)
        .join('\n\n');
}

export function ideaHandlers({ llm, promptsDir }: HandlerDeps): HandlerDefinition[] {
    return [
        defineHandler({
            kind: 'idea-generation',
            description: 'Generate a list of ideas about a topic',
            schema: ideaGenerationSchema,
            handler: async ({ payload, signal }): Promise<LlmTaskResult> => {
                const prompt = fillTemplate(loadTemplate('generate-ideas', promptsDir), {
                    count: String(payload.count),
                    topic: payload.topic.trim(),
                });
                const completion = await llm.complete({
                    prompt,
                    model: payload.model,
                    temperature: payload.temperature,
                    signal,
                });
                return { content: cleanResponse(completion.content), model: completion.model };
            },
        }),
        defineHandler({
            kind: 'merge-ideas',
            description: 'Merge several idea documents into one',
            schema: mergeIdeasSchema,
            handler: async ({ payload, signal }): Promise<LlmTaskResult> => {
                const prompt = combinePrompt(loadTemplate('merge-ideas', promptsDir), formatDocuments(payload.documents));
                const completion = await llm.complete({ prompt, model: payload.model, signal });
                return { content: cleanResponse(completion.content), model: completion.model };
            },
        }),
    ];
}
