import { describe, it, expect, vi, beforeEach } from 'vitest';
import { ErrorHandlingMiddleware } from '../src/core/middleware/error.middleware.js';
import { LoggingMiddleware } from '../src/core/middleware/logging.middleware.js';
import { ExecutionContext } from '../src/core/execution.context.js';
import { RpcErrorCode } from '../src/core/types.js';
import type { JSONRPCRequest } from '../src/core/types.js';
import { silentLogger } from './helpers/fake.upstream.js';

describe('Middleware Tests', () => {
    let context: ExecutionContext;
    const request: JSONRPCRequest = { jsonrpc: '2.0', id: 1, method: 'tools/list' };

    beforeEach(() => {
        context = new ExecutionContext({ logger: silentLogger });
    });

    describe('ErrorHandlingMiddleware', () => {
        it('should pass responses through', async () => {
            const next = vi.fn().mockResolvedValue({ jsonrpc: '2.0', id: 1, result: 'ok' });
            const result = await new ErrorHandlingMiddleware().handle(request, context, next);
            expect(result).toEqual({ jsonrpc: '2.0', id: 1, result: 'ok' });
        });

        it('should turn thrown errors into internal errors', async () => {
            const next = vi.fn().mockRejectedValue(new Error('kaboom'));
            const result = await new ErrorHandlingMiddleware().handle(request, context, next);
            expect(result).toEqual({
                jsonrpc: '2.0',
                id: 1,
                error: { code: RpcErrorCode.InternalError, message: 'kaboom' },
            });
        });

        it('should stay silent for failing notifications', async () => {
            const next = vi.fn().mockRejectedValue(new Error('kaboom'));
            const result = await new ErrorHandlingMiddleware().handle({ jsonrpc: '2.0', method: 'notifications/x' }, context, next);
            expect(result).toBeNull();
        });
    });

    describe('LoggingMiddleware', () => {
        it('should give downstream handlers a request-scoped logger', async () => {
            const original = context.logger;
            const next = vi.fn().mockResolvedValue(null);

            const result = await new LoggingMiddleware().handle(request, context, next);

            expect(result).toBeNull();
            expect(next).toHaveBeenCalledTimes(1);
            expect(context.logger).not.toBe(original);
            expect(context.logger.bindings()).toMatchObject({ method: 'tools/list', id: 1 });
            expect(context.logger.bindings()).not.toHaveProperty('remoteAddress');
        });

        it('should bind the remote address when the transport knows it', async () => {
            const stdioContext = new ExecutionContext({ logger: silentLogger, remoteAddress: 'stdio' });
            const next = vi.fn().mockResolvedValue(null);

            await new LoggingMiddleware().handle(request, stdioContext, next);

            expect(stdioContext.logger.bindings()).toMatchObject({ method: 'tools/list', id: 1, remoteAddress: 'stdio' });
        });
    });
});
