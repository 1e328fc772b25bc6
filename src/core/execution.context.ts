import { v4 as uuidv4 } from 'uuid';
import type { Logger } from 'pino';

export interface ExecutionContextOptions {
    logger: Logger;
    remoteAddress?: string;
}

export class ExecutionContext {
    public readonly correlationId: string;
    public readonly startTime: number;
    public logger: Logger;
    public readonly remoteAddress?: string;

    constructor(options: ExecutionContextOptions) {
        this.correlationId = uuidv4();
        this.startTime = Date.now();
        this.remoteAddress = options.remoteAddress;
        this.logger = options.logger.child({
            correlationId: this.correlationId,
        });
    }

    getDuration(): number {
        return Date.now() - this.startTime;
    }
}
