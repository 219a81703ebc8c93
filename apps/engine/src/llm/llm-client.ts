/**
 * The LLM collaborator as task handlers see it: prompt in, completion out.
 * Implementations throw TransientTaskError / PermanentTaskError so the
 * executor can decide whether a failure is worth retrying.
 */
export interface LlmRequest {
    prompt: string;
    model?: string;
    temperature?: number;
    maxTokens?: number;
    // extra system-level context, sent ahead of the prompt
    context?: string[];
    signal?: AbortSignal;
}

export interface LlmCompletion {
    content: string;
    model: string;
    usage?: {
        promptTokens: number;
        completionTokens: number;
        totalTokens: number;
    };
}

export interface LlmClient {
    complete(request: LlmRequest): Promise<LlmCompletion>;
}
