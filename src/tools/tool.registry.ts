import { Ajv } from 'ajv';
import type { Logger } from 'pino';
import { InvalidArgumentError, toErrorPayload } from '../core/errors.js';
import type { ExecutionContext } from '../core/execution.context.js';
import { toolError } from './tool.types.js';
import type { ToolDefinition, ToolResult, ToolSpec } from './tool.types.js';

interface RegisteredTool {
    definition: ToolDefinition;
    invoke(args: unknown, context: ExecutionContext): Promise<ToolResult>;
}

export class ToolRegistry {
    private logger: Logger;
    private ajv: Ajv;
    private tools = new Map<string, RegisteredTool>();

    constructor(logger: Logger) {
        this.logger = logger;
        this.ajv = new Ajv({ strict: false, allErrors: true });
    }

    register<TArgs>(spec: ToolSpec<TArgs>): void {
        const { name } = spec.definition;
        if (this.tools.has(name)) {
            throw new Error(`Tool already registered: ${name}`);
        }

        // Compiled once; the guard narrows raw arguments to the handler's shape
        const validate = this.ajv.compile<TArgs>(spec.definition.inputSchema);
        this.tools.set(name, {
            definition: spec.definition,
            invoke: async (args, context) => {
                const candidate = args ?? {};
                if (!validate(candidate)) {
                    throw new InvalidArgumentError(`Invalid arguments for ${name}: ${this.ajv.errorsText(validate.errors)}`);
                }
                return spec.handler(candidate, context);
            },
        });
        this.logger.debug({ tool: name }, 'Registered tool');
    }

    list(): ToolDefinition[] {
        return [...this.tools.values()].map(tool => tool.definition);
    }

    has(name: string): boolean {
        return this.tools.has(name);
    }

    /** Never throws: every failure becomes an error envelope flagged `isError`. */
    async call(name: string, args: unknown, context: ExecutionContext): Promise<ToolResult> {
        const tool = this.tools.get(name);
        if (!tool) {
            return toolError(new InvalidArgumentError(`Unknown tool: ${name}`));
        }

        try {
            const result = await tool.invoke(args, context);
            context.logger.debug({ tool: name, isError: result.isError ?? false }, 'Tool call finished');
            return result;
        } catch (err) {
            const payload = toErrorPayload(err);
            const level = payload.errorType === 'InternalError' ? 'error' : 'warn';
            context.logger[level]({ tool: name, errorType: payload.errorType, err: payload.error }, 'Tool call failed');
            return toolError(err);
        }
    }
}
