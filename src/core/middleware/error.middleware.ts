import type { Middleware, NextFunction } from '../interfaces/middleware.interface.js';
import { RpcErrorCode } from '../types.js';
import type { JSONRPCRequest, JSONRPCResponse } from '../types.js';
import type { ExecutionContext } from '../execution.context.js';

export class ErrorHandlingMiddleware implements Middleware {
    async handle(request: JSONRPCRequest, context: ExecutionContext, next: NextFunction): Promise<JSONRPCResponse | null> {
        try {
            return await next();
        } catch (err) {
            context.logger.error({ err }, 'Error handling request');
            if (request.id === undefined) {
                return null;
            }
            return {
                jsonrpc: '2.0',
                id: request.id,
                error: {
                    code: RpcErrorCode.InternalError,
                    message: err instanceof Error && err.message ? err.message : 'Internal Server Error',
                },
            };
        }
    }
}
