import type { Logger } from 'pino';
import {
    CallToolRequestSchema,
    GetPromptRequestSchema,
    LATEST_PROTOCOL_VERSION,
    SUPPORTED_PROTOCOL_VERSIONS,
} from '@modelcontextprotocol/sdk/types.js';
import { InvalidArgumentError } from './errors.js';
import type { ExecutionContext } from './execution.context.js';
import type { Middleware } from './interfaces/middleware.interface.js';
import { RpcErrorCode } from './types.js';
import type { JSONRPCId, JSONRPCRequest, JSONRPCResponse, ServerInfo } from './types.js';
import type { PromptRegistry } from '../prompts/prompt.registry.js';
import type { ToolRegistry } from '../tools/tool.registry.js';

export class RequestController {
    private logger: Logger;
    private tools: ToolRegistry;
    private prompts: PromptRegistry;
    private serverInfo: ServerInfo;
    private middlewares: Middleware[];

    constructor(
        logger: Logger,
        tools: ToolRegistry,
        prompts: PromptRegistry,
        serverInfo: ServerInfo,
        middlewares: Middleware[] = []
    ) {
        this.logger = logger;
        this.tools = tools;
        this.prompts = prompts;
        this.serverInfo = serverInfo;
        this.middlewares = middlewares;
    }

    /** Runs the middleware chain, then dispatches. Null means nothing is sent back. */
    async handleRequest(request: JSONRPCRequest, context: ExecutionContext): Promise<JSONRPCResponse | null> {
        const run = async (index: number): Promise<JSONRPCResponse | null> => {
            const middleware = this.middlewares[index];
            if (!middleware) {
                return this.dispatch(request, context);
            }
            return middleware.handle(request, context, () => run(index + 1));
        };
        return run(0);
    }

    private async dispatch(request: JSONRPCRequest, context: ExecutionContext): Promise<JSONRPCResponse | null> {
        const { method, params, id } = request;

        if (id === undefined) {
            // Notifications (notifications/initialized, notifications/cancelled, ...) are acknowledged silently
            context.logger.debug({ method }, 'Notification received');
            return null;
        }

        switch (method) {
            case 'initialize':
                return this.handleInitialize(params, id);
            case 'ping':
                return { jsonrpc: '2.0', id, result: {} };
            case 'tools/list':
                return { jsonrpc: '2.0', id, result: { tools: this.tools.list() } };
            case 'tools/call':
                return this.handleCallTool(params, context, id);
            case 'prompts/list':
                return { jsonrpc: '2.0', id, result: { prompts: this.prompts.list() } };
            case 'prompts/get':
                return this.handleGetPrompt(params, id);
            default:
                return this.errorResponse(id, RpcErrorCode.MethodNotFound, `Method not found: ${method}`);
        }
    }

    private handleInitialize(params: Record<string, unknown> | undefined, id: JSONRPCId): JSONRPCResponse {
        const requested = params?.protocolVersion;
        const protocolVersion = typeof requested === 'string' && SUPPORTED_PROTOCOL_VERSIONS.includes(requested)
            ? requested
            : LATEST_PROTOCOL_VERSION;

        this.logger.info({ protocolVersion, clientInfo: params?.clientInfo }, 'Client initialized');
        return {
            jsonrpc: '2.0',
            id,
            result: {
                protocolVersion,
                capabilities: { tools: {}, prompts: {} },
                serverInfo: this.serverInfo,
            },
        };
    }

    private async handleCallTool(params: Record<string, unknown> | undefined, context: ExecutionContext, id: JSONRPCId): Promise<JSONRPCResponse> {
        const parsed = CallToolRequestSchema.safeParse({ method: 'tools/call', params });
        if (!parsed.success) {
            return this.errorResponse(id, RpcErrorCode.InvalidParams, 'tools/call requires a tool name');
        }

        const { name, arguments: toolArgs } = parsed.data.params;
        const result = await this.tools.call(name, toolArgs ?? {}, context);
        return { jsonrpc: '2.0', id, result };
    }

    private handleGetPrompt(params: Record<string, unknown> | undefined, id: JSONRPCId): JSONRPCResponse {
        const parsed = GetPromptRequestSchema.safeParse({ method: 'prompts/get', params });
        if (!parsed.success) {
            return this.errorResponse(id, RpcErrorCode.InvalidParams, 'prompts/get requires a prompt name');
        }

        const { name, arguments: promptArgs } = parsed.data.params;
        try {
            return { jsonrpc: '2.0', id, result: this.prompts.get(name, promptArgs) };
        } catch (err) {
            if (err instanceof InvalidArgumentError) {
                return this.errorResponse(id, RpcErrorCode.InvalidParams, err.message);
            }
            throw err;
        }
    }

    private errorResponse(id: JSONRPCId, code: number, message: string): JSONRPCResponse {
        return {
            jsonrpc: '2.0',
            id,
            error: {
                code,
                message,
            },
        };
    }
}
