import pino from 'pino';
import type { Logger } from 'pino';
import { AsyncLocalStorage } from 'node:async_hooks';
import type { ConfigService } from './config.service.js';

export const loggerStorage = new AsyncLocalStorage<{ correlationId: string }>();

export function createLogger(configService: ConfigService): Logger {
    const logLevel = configService.get('logLevel');
    const redactionPatterns = configService.get('secretRedactionPatterns');
    const secretPatterns = redactionPatterns.map(p => new RegExp(p, 'g'));

    const redactString = (str: string) => {
        let result = str;
        for (const pattern of secretPatterns) {
            result = result.replace(pattern, '[REDACTED]');
        }
        return result;
    };

    const redactArg = (arg: unknown): unknown => {
        if (typeof arg === 'string') {
            return redactString(arg);
        }
        if (typeof arg === 'object' && arg !== null && !(arg instanceof Error) && !Array.isArray(arg)) {
            // Shallow: only top-level string values
            const clone: Record<string, unknown> = { ...arg };
            for (const key of Object.keys(clone)) {
                const value = clone[key];
                if (typeof value === 'string') {
                    clone[key] = redactString(value);
                }
            }
            return clone;
        }
        return arg;
    };

    return pino({
        level: logLevel,
        hooks: {
            logMethod(inputArgs, method) {
                const redactedArgs: unknown[] = inputArgs.map(redactArg);
                Reflect.apply(method, this, redactedArgs);
            }
        },
        redact: {
            paths: ['headers.Authorization', 'headers.authorization', 'arguments.password', 'arguments.token'],
            censor: '[REDACTED]',
        },
        mixin() {
            const store = loggerStorage.getStore();
            return {
                correlationId: store?.correlationId,
            };
        },
        // stdout carries the protocol; logs always go to stderr
        transport: configService.get('nodeEnv') === 'development'
            ? { target: 'pino-pretty', options: { colorize: true, destination: 2 } }
            : undefined,
    }, configService.get('nodeEnv') === 'development'
        ? undefined
        : pino.destination(2)
    );
}
