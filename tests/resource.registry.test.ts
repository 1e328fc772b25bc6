import { describe, it, expect } from 'vitest';
import fs from 'node:fs';
import { RESOURCE_KINDS, ResourceRegistry } from '../src/resources/resource.registry.js';
import { normalize } from '../src/resources/resource.normalizers.js';

const catalog: unknown = JSON.parse(fs.readFileSync(new URL('../config/resources.json', import.meta.url), 'utf-8'));

describe('ResourceRegistry', () => {
    const registry = ResourceRegistry.load();

    it('loads every resource kind from the catalog', () => {
        expect(registry.kinds()).toEqual([...RESOURCE_KINDS]);
    });

    it('describes DCI resources with offset paging', () => {
        const job = registry.get('job');
        expect(job).toMatchObject({
            kind: 'job',
            upstream: 'dci',
            dialect: 'dci',
            path: '/api/v1/jobs',
            itemsKey: 'jobs',
            itemKey: 'job',
            totalPath: '_meta.count',
            paging: { style: 'offset', limitParam: 'limit', offsetParam: 'offset' },
            maxLimit: 200,
            maxPageSize: 100,
        });
        expect(job.fields).toContain('status');
    });

    it('describes Drive documents with cursor paging', () => {
        expect(registry.get('document').paging).toEqual({
            style: 'cursor',
            sizeParam: 'pageSize',
            cursorParam: 'pageToken',
            nextCursorKey: 'nextPageToken',
        });
    });

    it('knows parent scoping keys', () => {
        expect(registry.parentKey('file', 'job')).toBe('job_id');
        expect(registry.parentKey('job', 'pipeline')).toBe('pipeline_id');
        expect(registry.parentKey('team', 'job')).toBeUndefined();
    });

    it('rejects a catalog with a missing kind', () => {
        const partial = JSON.parse(JSON.stringify(catalog));
        delete partial.ticket;
        expect(() => new ResourceRegistry(partial)).toThrow('Invalid resource catalog: missing kind "ticket"');
    });

    it('rejects a malformed entry', () => {
        const broken = JSON.parse(JSON.stringify(catalog));
        broken.job.paging = { style: 'pages' };
        expect(() => new ResourceRegistry(broken)).toThrow(/Invalid resource catalog: job\.paging/);
    });
});

describe('normalize', () => {
    it('leaves DCI items untouched', () => {
        const items = [{ id: 'j1', status: 'success' }];
        expect(normalize('job', items, 'https://dci.example.test')).toEqual(items);
    });

    it('flattens Jira issues', () => {
        const [ticket] = normalize('ticket', [{
            key: 'CILAB-1',
            fields: {
                summary: 'Broken',
                status: { name: 'Open' },
                assignee: { displayName: 'Ada' },
                project: { key: 'CILAB' },
                resolution: null,
            },
        }], 'https://jira.example.test/');

        expect(ticket).toEqual({
            key: 'CILAB-1',
            summary: 'Broken',
            status: 'Open',
            assignee: 'Ada',
            project: 'CILAB',
            labels: [],
            url: 'https://jira.example.test/browse/CILAB-1',
        });
    });

    it('derives a document url from the id when Drive sends no link', () => {
        const [doc] = normalize('document', [{ id: 'd1', name: 'Plan' }], 'https://drive.example.test');
        expect(doc).toEqual({ id: 'd1', name: 'Plan', url: 'https://docs.google.com/document/d/d1/edit' });
    });
});
