import { InvalidArgumentError } from '../core/errors.js';

export interface PromptArgument {
    name: string;
    description: string;
    required: boolean;
}

export interface PromptDefinition {
    name: string;
    description: string;
    arguments: PromptArgument[];
}

export interface PromptMessage {
    role: 'user' | 'assistant';
    content: { type: 'text'; text: string };
}

export interface PromptResult {
    description: string;
    messages: PromptMessage[];
}

export interface PromptSpec {
    definition: PromptDefinition;
    render(args: Record<string, string>): PromptMessage[];
}

/** Named prompt templates served through prompts/list and prompts/get. */
export class PromptRegistry {
    private prompts = new Map<string, PromptSpec>();

    register(spec: PromptSpec): void {
        const { name } = spec.definition;
        if (this.prompts.has(name)) {
            throw new Error(`Prompt ${name} is already registered`);
        }
        this.prompts.set(name, spec);
    }

    list(): PromptDefinition[] {
        return [...this.prompts.values()].map(spec => spec.definition);
    }

    get(name: string, args: Record<string, string> = {}): PromptResult {
        const spec = this.prompts.get(name);
        if (!spec) {
            throw new InvalidArgumentError(`Unknown prompt: ${name}`);
        }
        const missing = spec.definition.arguments
            .filter(arg => arg.required && (args[arg.name] ?? '').trim() === '')
            .map(arg => arg.name);
        if (missing.length > 0) {
            throw new InvalidArgumentError(`Missing arguments for ${name}: ${missing.join(', ')}`);
        }
        return { description: spec.definition.description, messages: spec.render(args) };
    }
}
