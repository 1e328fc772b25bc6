import type { Logger } from 'pino';
import type { Readable, Writable } from 'node:stream';
import type { RequestController } from '../core/request.controller.js';
import { RpcErrorCode } from '../core/types.js';
import type { JSONRPCId, JSONRPCRequest, JSONRPCResponse } from '../core/types.js';
import { ExecutionContext } from '../core/execution.context.js';
import { loggerStorage } from '../core/logger.js';

function isJsonRpcId(value: unknown): value is JSONRPCId {
    return typeof value === 'string' || typeof value === 'number';
}

function toRequest(message: unknown): JSONRPCRequest | undefined {
    if (typeof message !== 'object' || message === null || Array.isArray(message)) {
        return undefined;
    }
    const method = 'method' in message ? message.method : undefined;
    const id = 'id' in message ? message.id : undefined;
    const params = 'params' in message ? message.params : undefined;
    if (typeof method !== 'string' || (id !== undefined && !isJsonRpcId(id))) {
        return undefined;
    }

    const request: JSONRPCRequest = { jsonrpc: '2.0', method, id };
    if (typeof params === 'object' && params !== null && !Array.isArray(params)) {
        request.params = Object.fromEntries(Object.entries(params));
    }
    return request;
}

/**
 * Newline-delimited JSON-RPC over a pair of streams (stdin/stdout by
 * default). Each line is handled independently; a failing request never
 * stops the loop.
 */
export class StdioTransport {
    private logger: Logger;
    private requestController: RequestController;
    private input: Readable;
    private output: Writable;
    private buffer: string = '';
    private inFlight = new Set<Promise<void>>();

    constructor(
        logger: Logger,
        requestController: RequestController,
        input: Readable = process.stdin,
        output: Writable = process.stdout
    ) {
        this.logger = logger;
        this.requestController = requestController;
        this.input = input;
        this.output = output;
    }

    async start(): Promise<void> {
        this.logger.info('Starting Stdio transport');

        this.input.setEncoding('utf8');
        this.input.on('data', this.handleData.bind(this));

        this.input.on('end', () => {
            this.logger.info('Stdin closed');
        });
    }

    private handleData(chunk: string) {
        this.buffer += chunk;

        let pos: number;
        while ((pos = this.buffer.indexOf('\n')) >= 0) {
            const line = this.buffer.substring(0, pos).trim();
            this.buffer = this.buffer.substring(pos + 1);

            if (!line) continue;

            const task = this.processLine(line).finally(() => this.inFlight.delete(task));
            this.inFlight.add(task);
        }
    }

    private async processLine(line: string): Promise<void> {
        let message: unknown;
        try {
            message = JSON.parse(line);
        } catch (err) {
            this.logger.error({ err, line }, 'Failed to parse JSON-RPC message');
            this.sendResponse({
                jsonrpc: '2.0',
                id: null,
                error: {
                    code: RpcErrorCode.ParseError,
                    message: 'Parse error',
                },
            });
            return;
        }

        const request = toRequest(message);
        if (!request) {
            this.sendResponse({
                jsonrpc: '2.0',
                id: null,
                error: {
                    code: RpcErrorCode.InvalidRequest,
                    message: 'Invalid Request',
                },
            });
            return;
        }

        const context = new ExecutionContext({
            logger: this.logger,
            remoteAddress: 'stdio',
        });

        await loggerStorage.run({ correlationId: context.correlationId }, async () => {
            try {
                const response = await this.requestController.handleRequest(request, context);
                // Don't send response for notifications (they return null)
                if (response !== null) {
                    this.sendResponse(response);
                }
            } catch (err) {
                this.logger.error({ err, requestId: request.id }, 'Request handling failed');
                if (request.id !== undefined) {
                    this.sendResponse({
                        jsonrpc: '2.0',
                        id: request.id,
                        error: {
                            code: RpcErrorCode.InternalError,
                            message: 'Internal server error'
                        }
                    });
                }
            }
        });
    }

    private sendResponse(response: JSONRPCResponse) {
        this.output.write(JSON.stringify(response) + '\n');
    }

    /** Stops reading and waits for requests already in progress. */
    async close(): Promise<void> {
        this.input.removeAllListeners();
        await Promise.allSettled([...this.inFlight]);
    }
}
