import { LlmClient } from '../llm/llm-client';

export interface LlmTaskResult {
    content: string;
    model: string;
    // where the content was also written, when the payload asked for a file
    outputFile?: string;
}

export interface HandlerDeps {
    llm: LlmClient;
    // overrides the bundled prompts directory
    promptsDir?: string;
}
