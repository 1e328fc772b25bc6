import type { Logger } from 'pino';
import type { PaginationLimits } from '../core/config.service.js';
import { PaginationController } from '../pagination/pagination.controller.js';
import { QueryTranslator } from '../query/query.translator.js';
import type { ResourceRegistry } from '../resources/resource.registry.js';
import { DocumentService } from '../upstream/document.service.js';
import { LocalFileSink, LocalFileSource } from '../upstream/file.sink.js';
import type { FileSink, FileSource } from '../upstream/file.sink.js';
import { JobLogService } from '../upstream/job.log.service.js';
import { TicketService } from '../upstream/ticket.service.js';
import { registerDateTools } from './date.tools.js';
import { registerDciTools } from './dci.tools.js';
import { registerDriveTools } from './drive.tools.js';
import { registerJiraTools } from './jira.tools.js';
import { ListFacade } from './list.facade.js';
import type { UpstreamClients } from './list.facade.js';
import { ToolRegistry } from './tool.registry.js';

export interface ToolRegistryOptions {
    logger: Logger;
    resources: ResourceRegistry;
    clients: UpstreamClients;
    pagination: PaginationLimits;
    sink?: FileSink;
    source?: FileSource;
    clock?: () => Date;
}

export function createToolRegistry(options: ToolRegistryOptions): ToolRegistry {
    const { logger, resources, clients } = options;
    const translator = new QueryTranslator();
    const facade = new ListFacade(resources, clients, translator, new PaginationController(options.pagination));
    const tools = new ToolRegistry(logger);

    registerDciTools(tools, {
        facade,
        resources,
        client: clients.dci,
        sink: options.sink ?? new LocalFileSink(),
        logs: new JobLogService(clients.dci, resources.get('job').path),
    });
    registerJiraTools(tools, { facade, resources, tickets: new TicketService(clients.jira) });
    registerDriveTools(tools, {
        facade,
        resources,
        documents: new DocumentService(clients.drive, translator),
        source: options.source ?? new LocalFileSource(),
    });
    registerDateTools(tools, options.clock);

    return tools;
}

export { ToolRegistry } from './tool.registry.js';
export type { ToolDefinition, ToolResult } from './tool.types.js';
