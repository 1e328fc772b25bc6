import type { Middleware } from '../interfaces/middleware.interface.js';
import { ErrorHandlingMiddleware } from './error.middleware.js';
import { LoggingMiddleware } from './logging.middleware.js';

/** Outermost first: errors are caught around everything, including logging. */
export function buildDefaultMiddleware(): Middleware[] {
    return [
        new ErrorHandlingMiddleware(),
        new LoggingMiddleware(),
    ];
}
