import type { ExecutionContext } from '../execution.context.js';
import type { JSONRPCRequest, JSONRPCResponse } from '../types.js';

/** Resolves to null for notifications, which get no response. */
export type NextFunction = () => Promise<JSONRPCResponse | null>;

export interface Middleware {
    handle(
        request: JSONRPCRequest,
        context: ExecutionContext,
        next: NextFunction
    ): Promise<JSONRPCResponse | null>;
}
