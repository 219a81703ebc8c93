import { HandlerDefinition, TaskPayload } from './types';

/**
 * Maps a task kind to the handler that performs it.
 * The executor only ever looks a kind up here, so new kinds are added by
 * registering a definition, never by touching the executor.
 */
export class HandlerRegistry {
    private definitions = new Map<string, HandlerDefinition>();
    private static readonly KIND_PATTERN = /^[a-z0-9][a-z0-9_-]*$/;
    private static readonly MAX_KIND_LENGTH = 64;

    register(definition: HandlerDefinition): HandlerDefinition {
        const { kind } = definition;
        if (!kind || kind.length === 0) {
            throw new Error('Task kind cannot be empty');
        }
        if (kind.length > HandlerRegistry.MAX_KIND_LENGTH) {
            throw new Error(`Task kind exceeds maximum length of ${HandlerRegistry.MAX_KIND_LENGTH} characters`);
        }
        if (!HandlerRegistry.KIND_PATTERN.test(kind)) {
            throw new Error('Task kind must contain only lowercase letters, digits, dashes, and underscores');
        }
        if (this.definitions.has(kind)) {
            throw new Error(`Handler for "${kind}" is already registered.`);
        }
        this.definitions.set(kind, definition);
        return definition;
    }

    get(kind: string): HandlerDefinition | undefined {
        return this.definitions.get(kind);
    }

    has(kind: string): boolean {
        return this.definitions.has(kind);
    }

    list(): string[] {
        return Array.from(this.definitions.keys()).sort();
    }
}

/**
 * Identity helper that lets the payload type flow from the schema into the handler.
 *
 * @example
 * const echo = defineHandler({
 *   kind: 'echo',
 *   schema: z.object({ text: z.string() }),
 *   handler: async ({ payload }) => ({ text: payload.text }),
 * });
 */
export function defineHandler<P extends TaskPayload, R>(definition: HandlerDefinition<P, R>): HandlerDefinition<P, R> {
    return definition;
}

export function createRegistry(definitions: HandlerDefinition[] = []): HandlerRegistry {
    const registry = new HandlerRegistry();
    for (const definition of definitions) {
        registry.register(definition);
    }
    return registry;
}
