import { PartialResultError, UpstreamUnavailableError } from '../core/errors.js';
import type { ErrorType } from '../core/errors.js';
import type { ExecutionContext } from '../core/execution.context.js';
import type { PaginationLimits } from '../core/config.service.js';
import type { ResultObject } from '../projection/field.projector.js';
import { asRecord } from '../resources/resource.normalizers.js';
import type { ResourceDescriptor } from '../resources/resource.registry.js';
import type { HttpClient, QueryParams } from '../upstream/http.client.js';

export interface ResultEnvelope {
    items: ResultObject[];
    count: number;
    total?: number;
    error?: string;
    errorType?: ErrorType;
}

export interface FetchRequest {
    filter: string;
    sort: string;
    limit: number;
    offset: number;
}

interface UpstreamPage {
    items: ResultObject[];
    total?: number;
    nextCursor?: string;
}

interface PagePosition {
    offset: number;
    cursor?: string;
    size: number;
}

function valueAtPath(data: ResultObject, path: string): unknown {
    let current: unknown = data;
    for (const segment of path.split('.')) {
        const record = asRecord(current);
        if (!record) return undefined;
        current = record[segment];
    }
    return current;
}

/**
 * Drives sequential page requests against one resource until the caller's
 * limit, the configured ceilings or the end of the upstream data. Pages are
 * appended in arrival order.
 */
export class PaginationController {
    private limits: PaginationLimits;

    constructor(limits: PaginationLimits) {
        this.limits = limits;
    }

    async fetchAll(
        client: HttpClient,
        descriptor: ResourceDescriptor,
        request: FetchRequest,
        context: ExecutionContext,
    ): Promise<ResultEnvelope> {
        if (request.limit === 0) {
            // Count probe: one item is asked for and thrown away
            const probe = await this.fetchPage(client, descriptor, request, { offset: request.offset, size: 1 }, context);
            return probe.total === undefined ? { items: [], count: 0 } : { items: [], count: 0, total: probe.total };
        }

        const target = Math.min(request.limit, this.limits.hardCap);
        const pageSize = request.limit <= descriptor.maxPageSize
            ? request.limit
            : Math.min(this.limits.defaultPageSize, descriptor.maxPageSize);

        const items: ResultObject[] = [];
        let total: number | undefined;
        let position: PagePosition = { offset: request.offset, size: pageSize };
        let pages = 0;

        while (items.length < target && pages < this.limits.maxPages) {
            const size = Math.min(pageSize, target - items.length);
            let page: UpstreamPage;
            try {
                page = await this.fetchPage(client, descriptor, request, { ...position, size }, context);
            } catch (err) {
                if (pages === 0) {
                    throw err;
                }
                const reason = err instanceof Error ? err.message : String(err);
                const partial = new PartialResultError(
                    `Fetched ${items.length} ${descriptor.label} before page ${pages + 1} failed: ${reason}`,
                    items.length,
                    { cause: err },
                );
                context.logger.warn({ kind: descriptor.kind, fetched: items.length, err: reason }, 'Returning partial result');
                return {
                    items,
                    count: items.length,
                    ...(total === undefined ? {} : { total }),
                    error: partial.message,
                    errorType: partial.type,
                };
            }

            pages++;
            total = page.total ?? total;
            items.push(...page.items.slice(0, target - items.length));

            if (page.items.length === 0) break;

            if (descriptor.paging.style === 'offset') {
                const nextOffset = position.offset + page.items.length;
                if (total !== undefined && nextOffset >= total) break;
                position = { offset: nextOffset, size: pageSize };
            } else {
                if (!page.nextCursor) break;
                position = { offset: 0, cursor: page.nextCursor, size: pageSize };
            }
        }

        if (pages >= this.limits.maxPages && items.length < target) {
            context.logger.warn({ kind: descriptor.kind, pages, fetched: items.length }, 'Stopped at page ceiling');
        }

        return total === undefined
            ? { items, count: items.length }
            : { items, count: items.length, total };
    }

    private async fetchPage(
        client: HttpClient,
        descriptor: ResourceDescriptor,
        request: FetchRequest,
        position: PagePosition,
        context: ExecutionContext,
    ): Promise<UpstreamPage> {
        const params: QueryParams = { ...descriptor.staticParams };
        if (request.filter) params[descriptor.filterParam] = request.filter;
        if (request.sort && descriptor.sortParam) params[descriptor.sortParam] = request.sort;

        const paging = descriptor.paging;
        if (paging.style === 'offset') {
            params[paging.limitParam] = position.size;
            params[paging.offsetParam] = position.offset;
        } else {
            params[paging.sizeParam] = position.size;
            if (position.cursor) params[paging.cursorParam] = position.cursor;
        }

        const data = asRecord(await client.getJson(descriptor.path, params, context));
        const rawItems = data?.[descriptor.itemsKey];
        if (!data || !Array.isArray(rawItems)) {
            throw new UpstreamUnavailableError(`${client.upstreamId} returned no "${descriptor.itemsKey}" list for ${descriptor.path}`);
        }

        const items: ResultObject[] = [];
        for (const raw of rawItems) {
            const item = asRecord(raw);
            if (!item) {
                throw new UpstreamUnavailableError(`${client.upstreamId} returned a non-object entry in "${descriptor.itemsKey}"`);
            }
            items.push(item);
        }

        const total = descriptor.totalPath ? valueAtPath(data, descriptor.totalPath) : undefined;
        const nextCursor = paging.style === 'cursor' ? data[paging.nextCursorKey] : undefined;

        return {
            items,
            total: typeof total === 'number' ? total : undefined,
            nextCursor: typeof nextCursor === 'string' && nextCursor.length > 0 ? nextCursor : undefined,
        };
    }
}
