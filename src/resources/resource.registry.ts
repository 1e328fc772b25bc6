import fs from 'node:fs';
import { z } from 'zod';
import { OPERATORS } from '../query/query.types.js';
import type { Clause, Query } from '../query/query.types.js';
import type { TranslationTarget } from '../query/query.translator.js';

export const RESOURCE_KINDS = [
    'job', 'component', 'file', 'pipeline', 'product', 'team', 'topic', 'remoteci', 'ticket', 'document',
] as const;

export type ResourceKind = typeof RESOURCE_KINDS[number];

const ResourceKindSchema = z.enum(RESOURCE_KINDS);

const OffsetPagingSchema = z.object({
    style: z.literal('offset'),
    limitParam: z.string().min(1),
    offsetParam: z.string().min(1),
});

const CursorPagingSchema = z.object({
    style: z.literal('cursor'),
    sizeParam: z.string().min(1),
    cursorParam: z.string().min(1),
    nextCursorKey: z.string().min(1),
});

const ClauseSchema = z.union([
    z.object({
        field: z.string().min(1),
        operator: z.enum(OPERATORS).exclude(['in']),
        value: z.string().min(1),
    }),
    z.object({
        field: z.string().min(1),
        operator: z.literal('in'),
        value: z.array(z.string().min(1)).min(1),
    }),
]);

const ResourceEntrySchema = z.object({
    upstream: z.enum(['dci', 'jira', 'drive']),
    dialect: z.enum(['dci', 'jql', 'drive']),
    label: z.string().min(1),
    path: z.string().startsWith('/'),
    itemsKey: z.string().min(1),
    itemKey: z.string().min(1).optional(),
    totalPath: z.string().min(1).optional(),
    filterParam: z.string().min(1),
    sortParam: z.string().min(1).optional(),
    paging: z.discriminatedUnion('style', [OffsetPagingSchema, CursorPagingSchema]),
    staticParams: z.record(z.union([z.string(), z.number(), z.boolean()])).default({}),
    baseQuery: z.array(ClauseSchema).default([]),
    defaultLimit: z.number().int().nonnegative(),
    maxLimit: z.number().int().positive(),
    maxPageSize: z.number().int().positive(),
    parents: z.record(ResourceKindSchema, z.string().min(1)).default({}),
    fields: z.array(z.string().min(1)).min(1),
}).refine(entry => entry.defaultLimit <= entry.maxLimit, {
    message: 'defaultLimit must not exceed maxLimit',
});

const CatalogSchema = z.record(ResourceKindSchema, ResourceEntrySchema);

export type ResourceEntry = z.infer<typeof ResourceEntrySchema>;

export interface ResourceDescriptor extends ResourceEntry {
    kind: ResourceKind;
}

const DEFAULT_CATALOG = new URL('../../config/resources.json', import.meta.url);

/**
 * Resource kinds resolved once at startup from the catalog file. Each entry
 * carries everything the listing pipeline needs: dialect, endpoint, paging
 * style, limits and the filter allow-list.
 */
export class ResourceRegistry {
    private descriptors: Map<ResourceKind, ResourceDescriptor>;

    constructor(catalog: unknown) {
        const parsed = CatalogSchema.safeParse(catalog);
        if (!parsed.success) {
            const issues = parsed.error.errors.map(e => `${e.path.join('.')}: ${e.message}`).join('; ');
            throw new Error(`Invalid resource catalog: ${issues}`);
        }

        this.descriptors = new Map();
        for (const kind of RESOURCE_KINDS) {
            const entry = parsed.data[kind];
            if (!entry) {
                throw new Error(`Invalid resource catalog: missing kind "${kind}"`);
            }
            this.descriptors.set(kind, { ...entry, kind });
        }
    }

    static load(source: URL | string = DEFAULT_CATALOG): ResourceRegistry {
        const raw = fs.readFileSync(source, 'utf-8');
        return new ResourceRegistry(JSON.parse(raw));
    }

    get(kind: ResourceKind): ResourceDescriptor {
        const descriptor = this.descriptors.get(kind);
        if (!descriptor) {
            throw new Error(`Unknown resource kind: ${kind}`);
        }
        return descriptor;
    }

    kinds(): ResourceKind[] {
        return [...this.descriptors.keys()];
    }

    /** The field that ties a `kind` item to its `parent`, if that scoping exists. */
    parentKey(kind: ResourceKind, parent: ResourceKind): string | undefined {
        return this.get(kind).parents[parent];
    }

    static translationTarget(descriptor: ResourceDescriptor): TranslationTarget {
        return { dialect: descriptor.dialect, fields: descriptor.fields, label: descriptor.label };
    }

    static baseQuery(descriptor: ResourceDescriptor): Query {
        return descriptor.baseQuery.map((clause): Clause => (clause.operator === 'in'
            ? { field: clause.field, operator: 'in', value: [...clause.value] }
            : { field: clause.field, operator: clause.operator, value: clause.value }));
    }
}
