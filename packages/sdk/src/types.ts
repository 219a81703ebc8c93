import type { ZodType, ZodTypeDef } from 'zod';

export type TaskPayload = Record<string, unknown>;

export interface HandlerContext<P extends TaskPayload = TaskPayload> {
    taskId: string;
    kind: string;
    payload: P;
    // 1-indexed; the claim that started this run already counted it
    attempt: number;
    // Aborted when a stop was requested for the running task
    signal: AbortSignal;
}

export interface HandlerDefinition<P extends TaskPayload = TaskPayload, R = unknown> {
    kind: string;
    /** Checked when a task is submitted and again before every run. */
    schema: ZodType<P, ZodTypeDef, unknown>;
    handler(ctx: HandlerContext<P>): Promise<R>;
    /** Runs longer than this are aborted and retried. */
    timeoutMs?: number;
    description?: string;
}
