import { InvalidArgumentError } from '../core/errors.js';
import type { ExecutionContext } from '../core/execution.context.js';
import { PaginationController } from '../pagination/pagination.controller.js';
import type { ResultEnvelope } from '../pagination/pagination.controller.js';
import { project } from '../projection/field.projector.js';
import { parseQuery, parseSort } from '../query/query.parser.js';
import { QueryTranslator } from '../query/query.translator.js';
import type { Query } from '../query/query.types.js';
import { normalize } from '../resources/resource.normalizers.js';
import { ResourceRegistry } from '../resources/resource.registry.js';
import type { ResourceKind } from '../resources/resource.registry.js';
import type { HttpClient, UpstreamId } from '../upstream/http.client.js';

export interface ListParams {
    query?: string;
    limit?: number;
    offset?: number;
    sort?: string;
    fields?: string[];
}

export interface ParentScope {
    kind: ResourceKind;
    id: string;
}

export type UpstreamClients = Record<UpstreamId, HttpClient>;

function checkCount(name: string, value: number): void {
    if (!Number.isInteger(value) || value < 0) {
        throw new InvalidArgumentError(`${name} must be a non-negative integer, got ${value}`);
    }
}

/**
 * Single entry point for every listing tool: validate, translate, paginate,
 * normalize, project.
 */
export class ListFacade {
    private registry: ResourceRegistry;
    private clients: UpstreamClients;
    private translator: QueryTranslator;
    private pagination: PaginationController;

    constructor(registry: ResourceRegistry, clients: UpstreamClients, translator: QueryTranslator, pagination: PaginationController) {
        this.registry = registry;
        this.clients = clients;
        this.translator = translator;
        this.pagination = pagination;
    }

    async listResource(kind: ResourceKind, params: ListParams, context: ExecutionContext, parent?: ParentScope): Promise<ResultEnvelope> {
        const descriptor = this.registry.get(kind);
        const limit = params.limit ?? descriptor.defaultLimit;
        const offset = params.offset ?? 0;

        checkCount('limit', limit);
        checkCount('offset', offset);
        if (limit > descriptor.maxLimit) {
            throw new InvalidArgumentError(`limit must be at most ${descriptor.maxLimit} for ${descriptor.label}, got ${limit}`);
        }
        if (offset > 0 && descriptor.paging.style === 'cursor') {
            throw new InvalidArgumentError(`${descriptor.label} are paged by cursor; offset is not supported`);
        }

        const query: Query = [...ResourceRegistry.baseQuery(descriptor)];
        if (parent) {
            const parentKey = this.registry.parentKey(kind, parent.kind);
            if (!parentKey) {
                throw new InvalidArgumentError(`${descriptor.label} cannot be scoped by ${parent.kind}`);
            }
            if (parent.id.trim() === '') {
                throw new InvalidArgumentError(`${parent.kind} id must not be empty`);
            }
            query.push({ field: parentKey, operator: 'eq', value: parent.id.trim() });
        }
        query.push(...parseQuery(params.query));

        const listing = this.translator.translateListing(
            query,
            parseSort(params.sort),
            ResourceRegistry.translationTarget(descriptor),
        );

        context.logger.debug({ kind, filter: listing.filter, sort: listing.sort, limit, offset }, 'Listing resource');

        const client = this.clients[descriptor.upstream];
        const envelope = await this.pagination.fetchAll(client, descriptor, { ...listing, limit, offset }, context);
        const items = project(normalize(kind, envelope.items, client.baseUrl), params.fields ?? []);

        return { ...envelope, items, count: items.length };
    }
}
