import { readFileSync } from 'fs';
import { resolve } from 'path';

export const PROMPTS_DIR = resolve(__dirname, '../../prompts');

export type TemplateName = 'refine-prompt' | 'breakdown' | 'generate-ideas' | 'merge-ideas' | 'execute-subtask';

const cache = new Map<string, string>();

export function loadTemplate(name: TemplateName, dir: string = PROMPTS_DIR): string {
    const file = resolve(dir, `${name}.md`);
    let template = cache.get(file);
    if (template === undefined) {
        template = readFileSync(file, 'utf-8');
        cache.set(file, template);
    }
    return template;
}

/** Replaces `{{name}}` placeholders; unknown placeholders are left as they are. */
export function fillTemplate(template: string, vars: Record<string, string>): string {
    return template.replace(/\{\{\s*([a-zA-Z0-9_]+)\s*\}\}/g, (match, key: string) => vars[key] ?? match);
}

export function combinePrompt(instructions: string, prompt: string): string {
    return `${instructions.trim()}\n\n${prompt.trim()}`;
}

// Reasoning models wrap their scratchpad in <think> tags
const THINK_BLOCK = /<think>[\s\S]*?<\/think>/gi;

export function cleanResponse(content: string): string {
    return content.replace(THINK_BLOCK, '').trim();
}
