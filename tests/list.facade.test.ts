import { describe, it, expect } from 'vitest';
import { ListFacade } from '../src/tools/list.facade.js';
import { PaginationController } from '../src/pagination/pagination.controller.js';
import { QueryTranslator } from '../src/query/query.translator.js';
import { ResourceRegistry } from '../src/resources/resource.registry.js';
import { InvalidArgumentError, InvalidQueryError } from '../src/core/errors.js';
import { FakeUpstream, dciPage, newContext, ok } from './helpers/fake.upstream.js';
import type { Reply, Responder } from './helpers/fake.upstream.js';

const registry = ResourceRegistry.load();

function setup(replies: Reply[] | Responder) {
    const upstream = new FakeUpstream(replies);
    const clients = {
        dci: upstream.client('dci', 'https://dci.example.test'),
        jira: upstream.client('jira', 'https://jira.example.test'),
        drive: upstream.client('drive', 'https://drive.example.test'),
    };
    const facade = new ListFacade(
        registry,
        clients,
        new QueryTranslator(),
        new PaginationController({ defaultPageSize: 50, hardCap: 1000, maxPages: 100 }),
    );
    return { upstream, facade };
}

describe('ListFacade', () => {
    it('translates, paginates and projects a job listing', async () => {
        const { upstream, facade } = setup((_config, index) => dciPage('jobs', [{
            id: `j${index + 1}`,
            status: 'failed',
            name: 'daily',
            created_at: `2025-01-0${index + 1}`,
        }]));

        const envelope = await facade.listResource('job', {
            query: 'status:eq:failed',
            limit: 5,
            offset: 0,
            sort: 'created_at:desc',
            fields: ['id', 'status'],
        }, newContext());

        expect(envelope.items).toEqual([
            { id: 'j1', status: 'failed' },
            { id: 'j2', status: 'failed' },
            { id: 'j3', status: 'failed' },
            { id: 'j4', status: 'failed' },
            { id: 'j5', status: 'failed' },
        ]);
        expect(envelope.count).toBe(5);
        expect(upstream.calls).toHaveLength(5);
        expect(upstream.calls[0]?.url).toBe('/api/v1/jobs');
        expect(upstream.params(0).query).toBe('eq(status,failed)');
        expect(upstream.params(0).sort).toBe('-created_at');
    });

    it('rejects a negative limit before any call', async () => {
        const { upstream, facade } = setup([]);
        await expect(facade.listResource('job', { limit: -1 }, newContext())).rejects.toThrow(InvalidArgumentError);
        expect(upstream.calls).toHaveLength(0);
    });

    it('rejects a limit over the resource maximum', async () => {
        const { facade } = setup([]);
        await expect(facade.listResource('job', { limit: 201 }, newContext()))
            .rejects.toThrow('limit must be at most 200 for DCI jobs, got 201');
    });

    it('rejects a fractional offset', async () => {
        const { facade } = setup([]);
        await expect(facade.listResource('job', { offset: 1.5 }, newContext())).rejects.toThrow(InvalidArgumentError);
    });

    it('rejects unknown fields before any call', async () => {
        const { upstream, facade } = setup([]);
        await expect(facade.listResource('job', { query: 'owner:eq:me' }, newContext())).rejects.toThrow(InvalidQueryError);
        expect(upstream.calls).toHaveLength(0);
    });

    it('returns empty objects when no fields are requested', async () => {
        const { facade } = setup([dciPage('teams', [{ id: 't1', name: 'ci' }], 1)]);
        const envelope = await facade.listResource('team', {}, newContext());
        expect(envelope).toEqual({ items: [{}], count: 1, total: 1 });
    });

    it('uses the resource default limit', async () => {
        const { upstream, facade } = setup([dciPage('remotecis', [], 0)]);
        await facade.listResource('remoteci', {}, newContext());
        expect(upstream.params(0).limit).toBe(20);
    });

    it('injects the parent clause for scoped listings', async () => {
        const { upstream, facade } = setup([dciPage('files', [{ id: 'f1', name: 'log.txt' }], 1)]);
        const envelope = await facade.listResource(
            'file',
            { query: 'name:eq:log.txt', fields: ['id'] },
            newContext(),
            { kind: 'job', id: 'j1' },
        );

        expect(envelope.items).toEqual([{ id: 'f1' }]);
        expect(upstream.params(0).query).toBe('and(eq(job_id,j1),eq(name,log.txt))');
    });

    it('rejects scoping a kind by an unrelated parent', async () => {
        const { facade } = setup([]);
        await expect(facade.listResource('team', {}, newContext(), { kind: 'job', id: 'j1' }))
            .rejects.toThrow('DCI teams cannot be scoped by job');
    });

    it('normalizes Jira issues and folds the ordering into the JQL', async () => {
        const { upstream, facade } = setup([ok({
            issues: [{ key: 'CILAB-7', fields: { summary: 'Flaky job', status: { name: 'Open' }, labels: ['ci'] } }],
            total: 1,
        })]);

        const envelope = await facade.listResource('ticket', {
            query: 'project:eq:CILAB',
            sort: 'created:desc',
            fields: ['key', 'status', 'labels', 'url'],
        }, newContext());

        expect(envelope.items).toEqual([
            { key: 'CILAB-7', status: 'Open', labels: ['ci'], url: 'https://jira.example.test/browse/CILAB-7' },
        ]);
        expect(upstream.calls[0]?.url).toBe('/rest/api/2/search');
        expect(upstream.params(0).jql).toBe('project = "CILAB" ORDER BY created DESC');
        expect(upstream.params(0).maxResults).toBe(50);
        expect(upstream.params(0).startAt).toBe(0);
    });

    it('restricts document listings to Google Docs', async () => {
        const { upstream, facade } = setup([ok({ files: [{ id: 'd1', name: 'Plan', webViewLink: 'https://docs.example.test/d1' }] })]);

        const envelope = await facade.listResource('document', { query: 'name:like:Plan', fields: ['id', 'url'] }, newContext());

        expect(envelope.items).toEqual([{ id: 'd1', url: 'https://docs.example.test/d1' }]);
        expect(upstream.params(0).q)
            .toBe("mimeType = 'application/vnd.google-apps.document' and trashed = false and name contains 'Plan'");
    });

    it('rejects an offset on cursor-paged kinds', async () => {
        const { facade } = setup([]);
        await expect(facade.listResource('document', { offset: 10 }, newContext())).rejects.toThrow(InvalidArgumentError);
    });

    it('reports only the total for a zero limit', async () => {
        const { facade } = setup([dciPage('components', [{ id: 'c1' }], 12)]);
        const envelope = await facade.listResource('component', { limit: 0 }, newContext());
        expect(envelope).toEqual({ items: [], count: 0, total: 12 });
    });
});
