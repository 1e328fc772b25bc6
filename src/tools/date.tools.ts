import type { ToolRegistry } from './tool.registry.js';
import { toolSuccess } from './tool.types.js';

type NoArgs = Record<string, never>;

const NO_ARGS = { type: 'object', properties: {}, additionalProperties: false } as const;

export function registerDateTools(tools: ToolRegistry, clock: () => Date = () => new Date()): void {
    tools.register<NoArgs>({
        definition: { name: 'today', description: "Today's date in UTC as YYYY-MM-DD", inputSchema: NO_ARGS },
        handler: async () => toolSuccess({ today: clock().toISOString().slice(0, 10) }),
    });

    tools.register<NoArgs>({
        definition: { name: 'now', description: 'The current UTC date and time as an ISO 8601 timestamp', inputSchema: NO_ARGS },
        handler: async () => toolSuccess({ now: clock().toISOString() }),
    });
}
