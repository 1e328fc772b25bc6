import type { Middleware, NextFunction } from '../interfaces/middleware.interface.js';
import type { JSONRPCRequest, JSONRPCResponse } from '../types.js';
import type { ExecutionContext } from '../execution.context.js';

export class LoggingMiddleware implements Middleware {
    async handle(request: JSONRPCRequest, context: ExecutionContext, next: NextFunction): Promise<JSONRPCResponse | null> {
        const { method, id } = request;
        const { remoteAddress } = context;
        // Downstream handlers log with the request fields
        context.logger = context.logger.child({ method, id, ...(remoteAddress ? { remoteAddress } : {}) });

        context.logger.debug('Request received');
        const response = await next();
        context.logger.info({
            durationMs: context.getDuration(),
            ...(response?.error ? { errorCode: response.error.code } : {}),
        }, 'Request completed');
        return response;
    }
}
