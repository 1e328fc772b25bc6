import type { ExecutionContext } from '../core/execution.context.js';
import { toErrorPayload } from '../core/errors.js';

export type ToolInputSchema = {
    type: 'object';
    properties: Record<string, object>;
    required?: string[];
    additionalProperties?: boolean;
};

export interface ToolDefinition {
    name: string;
    description: string;
    inputSchema: ToolInputSchema;
}

export interface ToolResult {
    content: Array<{ type: 'text'; text: string }>;
    isError?: boolean;
}

export type ToolHandler<TArgs> = (args: TArgs, context: ExecutionContext) => Promise<ToolResult>;

export interface ToolSpec<TArgs> {
    definition: ToolDefinition;
    handler: ToolHandler<TArgs>;
}

export function toolSuccess(payload: unknown): ToolResult {
    return { content: [{ type: 'text', text: JSON.stringify(payload, null, 2) }] };
}

export function toolError(err: unknown): ToolResult {
    return { content: [{ type: 'text', text: JSON.stringify(toErrorPayload(err), null, 2) }], isError: true };
}

/** Argument schema shared by every listing tool. */
export const LIST_PROPERTIES: Record<string, object> = {
    query: {
        type: 'string',
        description: 'Filter clauses "field:op:value" joined by ","; op is one of eq, ne, lt, le, gt, ge, like, in ("in" values separated by "|")',
    },
    limit: { type: 'integer', description: 'Maximum number of items to return; 0 only reports the total' },
    offset: { type: 'integer', description: 'Number of items to skip' },
    sort: { type: 'string', description: 'Sort keys "field:asc" or "field:desc" joined by ","' },
    fields: {
        type: 'array',
        items: { type: 'string' },
        description: 'Fields to keep in each item; an empty or missing list returns empty objects',
    },
};

export interface ListArgs {
    query?: string;
    limit?: number;
    offset?: number;
    sort?: string;
    fields?: string[];
}
