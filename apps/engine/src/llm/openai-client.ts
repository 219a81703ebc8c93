import OpenAI from 'openai';
import { PermanentTaskError, TransientTaskError } from '@promptqueue/sdk';
import { LlmConfig } from '../config';
import { LlmClient, LlmCompletion, LlmRequest } from './llm-client';

const TAG = '[llm]';

// Statuses an OpenAI-compatible server returns for conditions that pass
const RETRYABLE_STATUS = new Set([408, 409, 429]);

export interface ChatResponse {
    model: string;
    choices: Array<{ message: { content: string | null } }>;
    usage?: { prompt_tokens: number; completion_tokens: number; total_tokens: number } | null;
}

export type CreateChat = (
    body: OpenAI.Chat.ChatCompletionCreateParamsNonStreaming,
    options: { signal?: AbortSignal },
) => Promise<ChatResponse>;

/**
 * Maps an `openai` SDK error onto the task error taxonomy.
 * A caller abort is passed through untouched.
 */
export function toTaskError(err: unknown): unknown {
    if (err instanceof OpenAI.APIUserAbortError) {
        return err;
    }
    if (err instanceof OpenAI.APIConnectionTimeoutError) {
        return new TransientTaskError('LLM request timed out', 'timeout', { cause: err });
    }
    if (err instanceof OpenAI.APIConnectionError) {
        return new TransientTaskError(`LLM endpoint unreachable: ${err.message}`, 'transient', { cause: err });
    }
    if (err instanceof OpenAI.APIError) {
        const status = err.status;
        const message = `LLM request failed (${status ?? 'no status'}): ${err.message}`;
        if (status === undefined || RETRYABLE_STATUS.has(status) || status >= 500) {
            return new TransientTaskError(message, 'transient', { cause: err });
        }
        return new PermanentTaskError(message, 'permanent', { cause: err });
    }
    return err;
}

/** LlmClient backed by the `openai` package, pointed at any compatible endpoint. */
export class OpenAICompatibleClient implements LlmClient {
    private readonly createChat: CreateChat;

    constructor(private readonly config: LlmConfig, createChat?: CreateChat) {
        if (createChat) {
            this.createChat = createChat;
        } else {
            const client = new OpenAI({
                baseURL: config.endpoint,
                apiKey: config.apiKey,
                timeout: config.timeoutMs,
                // retries belong to the queue, not the HTTP client
                maxRetries: 0,
            });
            this.createChat = (body, options) => client.chat.completions.create(body, options);
        }
    }

    async complete(request: LlmRequest): Promise<LlmCompletion> {
        const model = request.model?.trim() || this.config.model;
        const messages: OpenAI.Chat.ChatCompletionMessageParam[] = [
            ...(request.context ?? []).map((content): OpenAI.Chat.ChatCompletionMessageParam => ({ role: 'system', content })),
            { role: 'user', content: request.prompt },
        ];

        let response: ChatResponse;
        try {
            response = await this.createChat({
                model,
                messages,
                temperature: request.temperature ?? this.config.temperature,
                max_tokens: request.maxTokens,
            }, { signal: request.signal });
        } catch (err) {
            throw toTaskError(err);
        }

        const content = response.choices[0]?.message.content ?? '';
        if (content.trim() === '') {
            console.warn(`${TAG} empty completion from ${model}`);
            throw new TransientTaskError(`Model ${model} returned an empty completion`);
        }

        return {
            content,
            model: response.model || model,
            usage: response.usage
                ? {
                    promptTokens: response.usage.prompt_tokens,
                    completionTokens: response.usage.completion_tokens,
                    totalTokens: response.usage.total_tokens,
                }
                : undefined,
        };
    }
}
