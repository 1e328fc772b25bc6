import type { ResultObject } from '../projection/field.projector.js';
import type { ResourceKind } from './resource.registry.js';

export type Normalizer = (item: ResultObject, baseUrl: string) => ResultObject;

export function asRecord(value: unknown): ResultObject | undefined {
    if (typeof value !== 'object' || value === null || Array.isArray(value)) {
        return undefined;
    }
    const record: ResultObject = {};
    for (const [key, entry] of Object.entries(value)) {
        record[key] = entry;
    }
    return record;
}

export function stringOf(value: unknown): string | undefined {
    return typeof value === 'string' ? value : undefined;
}

/** Jira nests most scalar fields as `{name}` or `{displayName}` objects. */
export function nameOf(value: unknown, key: 'name' | 'displayName' | 'key' = 'name'): string | undefined {
    return stringOf(asRecord(value)?.[key]);
}

export function namesOf(value: unknown): string[] {
    if (!Array.isArray(value)) return [];
    return value.map(entry => (typeof entry === 'string' ? entry : nameOf(entry))).filter((n): n is string => n !== undefined);
}

export function browseUrl(baseUrl: string, key: string): string {
    return `${baseUrl.replace(/\/$/, '')}/browse/${key}`;
}

export const normalizeTicket: Normalizer = (issue, baseUrl) => {
    const key = stringOf(issue.key) ?? '';
    const fields = asRecord(issue.fields) ?? {};
    return {
        key,
        summary: stringOf(fields.summary),
        status: nameOf(fields.status),
        priority: nameOf(fields.priority),
        issuetype: nameOf(fields.issuetype),
        assignee: nameOf(fields.assignee, 'displayName'),
        reporter: nameOf(fields.reporter, 'displayName'),
        project: nameOf(fields.project, 'key'),
        labels: namesOf(fields.labels),
        created: stringOf(fields.created),
        updated: stringOf(fields.updated),
        resolution: nameOf(fields.resolution),
        url: browseUrl(baseUrl, key),
    };
};

export const normalizeDocument: Normalizer = file => {
    const id = stringOf(file.id);
    const url = stringOf(file.webViewLink) ?? (id ? `https://docs.google.com/document/d/${id}/edit` : undefined);
    return { ...file, url };
};

const NORMALIZERS: Partial<Record<ResourceKind, Normalizer>> = {
    ticket: normalizeTicket,
    document: normalizeDocument,
};

export function normalize(kind: ResourceKind, items: readonly ResultObject[], baseUrl: string): ResultObject[] {
    const normalizer = NORMALIZERS[kind];
    return normalizer ? items.map(item => normalizer(item, baseUrl)) : [...items];
}
