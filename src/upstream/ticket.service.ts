import { InvalidArgumentError } from '../core/errors.js';
import type { ExecutionContext } from '../core/execution.context.js';
import type { ResultObject } from '../projection/field.projector.js';
import { asRecord, browseUrl, nameOf, namesOf, stringOf } from '../resources/resource.normalizers.js';
import type { HttpClient } from './http.client.js';

const TICKET_KEY = /^[A-Z][A-Z0-9]+-\d+$/;
const PROJECT_KEY = /^[A-Z][A-Z0-9_]+$/;

export const MAX_COMMENTS_LIMIT = 50;

export interface TicketComment {
    id?: string;
    author: string;
    body?: string;
    created?: string;
    updated?: string;
}

export interface TicketChange {
    field?: string;
    fieldType?: string;
    from?: string;
    to?: string;
}

export interface TicketHistory {
    author: string;
    created?: string;
    items: TicketChange[];
}

export interface Ticket {
    key: string;
    summary?: string;
    description?: string;
    status?: string;
    priority?: string;
    issueType?: string;
    assignee?: string;
    reporter?: string;
    created?: string;
    updated?: string;
    resolution?: string;
    labels: string[];
    components: string[];
    fixVersions: string[];
    affectedVersions: string[];
    url: string;
    comments: TicketComment[];
    changelog: TicketHistory[];
}

export interface Project {
    key: string;
    name?: string;
    description?: string;
    lead?: string;
    url: string;
}

export function normalizeTicketKey(raw: string): string {
    const key = raw.trim().toUpperCase();
    if (!TICKET_KEY.test(key)) {
        throw new InvalidArgumentError(`Invalid ticket key "${raw}": expected PROJECT-123`);
    }
    return key;
}

export function normalizeProjectKey(raw: string): string {
    const key = raw.trim().toUpperCase();
    if (!PROJECT_KEY.test(key)) {
        throw new InvalidArgumentError(`Invalid project key "${raw}": expected letters and digits such as CILAB`);
    }
    return key;
}

function records(value: unknown): ResultObject[] {
    if (!Array.isArray(value)) return [];
    return value.map(asRecord).filter((r): r is ResultObject => r !== undefined);
}

function toComment(raw: ResultObject): TicketComment {
    return {
        id: stringOf(raw.id),
        author: nameOf(raw.author, 'displayName') ?? 'Unknown',
        body: stringOf(raw.body),
        created: stringOf(raw.created),
        updated: stringOf(raw.updated),
    };
}

function toHistory(raw: ResultObject): TicketHistory {
    return {
        author: nameOf(raw.author, 'displayName') ?? 'Unknown',
        created: stringOf(raw.created),
        items: records(raw.items).map(item => ({
            field: stringOf(item.field),
            fieldType: stringOf(item.fieldtype),
            from: stringOf(item.fromString),
            to: stringOf(item.toString),
        })),
    };
}

/** Ticket and project reads against the Jira REST API. Searches go through the listing pipeline. */
export class TicketService {
    private client: HttpClient;

    constructor(client: HttpClient) {
        this.client = client;
    }

    async getTicket(rawKey: string, maxComments: number, context: ExecutionContext): Promise<Ticket> {
        const key = normalizeTicketKey(rawKey);
        if (!Number.isInteger(maxComments) || maxComments < 1 || maxComments > MAX_COMMENTS_LIMIT) {
            throw new InvalidArgumentError(`max_comments must be between 1 and ${MAX_COMMENTS_LIMIT}, got ${maxComments}`);
        }

        const issue = asRecord(await this.client.getJson(
            `/rest/api/2/issue/${encodeURIComponent(key)}`,
            { expand: 'changelog' },
            context,
        )) ?? {};
        const fields = asRecord(issue.fields) ?? {};
        const comments = records(asRecord(fields.comment)?.comments);
        const histories = records(asRecord(issue.changelog)?.histories);
        const resolvedKey = stringOf(issue.key) ?? key;

        return {
            key: resolvedKey,
            summary: stringOf(fields.summary),
            description: stringOf(fields.description),
            status: nameOf(fields.status),
            priority: nameOf(fields.priority),
            issueType: nameOf(fields.issuetype),
            assignee: nameOf(fields.assignee, 'displayName'),
            reporter: nameOf(fields.reporter, 'displayName'),
            created: stringOf(fields.created),
            updated: stringOf(fields.updated),
            resolution: nameOf(fields.resolution),
            labels: namesOf(fields.labels),
            components: namesOf(fields.components),
            fixVersions: namesOf(fields.fixVersions),
            affectedVersions: namesOf(fields.versions),
            url: browseUrl(this.client.baseUrl, resolvedKey),
            comments: comments.slice(-maxComments).map(toComment),
            changelog: histories.map(toHistory),
        };
    }

    async getProject(rawKey: string, context: ExecutionContext): Promise<Project> {
        const key = normalizeProjectKey(rawKey);
        const project = asRecord(await this.client.getJson(
            `/rest/api/2/project/${encodeURIComponent(key)}`,
            undefined,
            context,
        )) ?? {};
        const resolvedKey = stringOf(project.key) ?? key;
        return {
            key: resolvedKey,
            name: stringOf(project.name),
            description: stringOf(project.description),
            lead: nameOf(project.lead, 'displayName'),
            url: browseUrl(this.client.baseUrl, resolvedKey),
        };
    }
}
