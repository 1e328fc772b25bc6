import type { TicketService } from '../upstream/ticket.service.js';
import { MAX_COMMENTS_LIMIT } from '../upstream/ticket.service.js';
import type { ResourceRegistry } from '../resources/resource.registry.js';
import type { ListFacade } from './list.facade.js';
import type { ToolRegistry } from './tool.registry.js';
import { LIST_PROPERTIES, toolSuccess } from './tool.types.js';
import type { ListArgs } from './tool.types.js';

interface TicketArgs {
    ticket_key: string;
    max_comments?: number;
}

interface ProjectArgs {
    project_key: string;
}

export interface JiraToolDeps {
    facade: ListFacade;
    resources: ResourceRegistry;
    tickets: TicketService;
}

export function registerJiraTools(tools: ToolRegistry, deps: JiraToolDeps): void {
    const { facade, resources, tickets } = deps;
    const descriptor = resources.get('ticket');

    tools.register<ListArgs>({
        definition: {
            name: 'search_jira_tickets',
            description: `Search Jira tickets. Filterable and sortable fields: ${descriptor.fields.join(', ')}`,
            inputSchema: { type: 'object', properties: LIST_PROPERTIES, additionalProperties: false },
        },
        handler: async (args, context) => toolSuccess(await facade.listResource('ticket', args, context)),
    });

    tools.register<TicketArgs>({
        definition: {
            name: 'get_jira_ticket',
            description: 'Get a Jira ticket with its latest comments and change history',
            inputSchema: {
                type: 'object',
                properties: {
                    ticket_key: { type: 'string', description: 'Ticket key such as CILAB-1234' },
                    max_comments: {
                        type: 'integer',
                        description: `Number of most recent comments to include (1-${MAX_COMMENTS_LIMIT}, default 10)`,
                    },
                },
                required: ['ticket_key'],
                additionalProperties: false,
            },
        },
        handler: async (args, context) => toolSuccess(await tickets.getTicket(args.ticket_key, args.max_comments ?? 10, context)),
    });

    tools.register<ProjectArgs>({
        definition: {
            name: 'get_jira_project_info',
            description: 'Get a Jira project: name, description, lead and browse url',
            inputSchema: {
                type: 'object',
                properties: {
                    project_key: { type: 'string', description: 'Project key such as CILAB' },
                },
                required: ['project_key'],
                additionalProperties: false,
            },
        },
        handler: async (args, context) => toolSuccess(await tickets.getProject(args.project_key, context)),
    });
}
