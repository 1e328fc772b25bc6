import { describe, it, expect } from 'vitest';
import { DocumentService } from '../src/upstream/document.service.js';
import { QueryTranslator } from '../src/query/query.translator.js';
import { InvalidArgumentError, InvalidQueryError, NotFoundError } from '../src/core/errors.js';
import { FakeUpstream, newContext, ok } from './helpers/fake.upstream.js';

function service(upstream: FakeUpstream) {
    return new DocumentService(upstream.client('drive', 'https://drive.example.test'), new QueryTranslator());
}

describe('DocumentService', () => {
    it('uploads markdown as a Google Doc', async () => {
        const upstream = new FakeUpstream([ok({ id: 'doc-1', name: 'Weekly report' })]);

        const created = await service(upstream).createDocument('# Weekly\n\n- item', 'Weekly report', {}, newContext());

        expect(created).toEqual({ id: 'doc-1', name: 'Weekly report', url: 'https://docs.google.com/document/d/doc-1/edit' });
        const call = upstream.calls[0];
        expect(call?.method).toBe('post');
        expect(call?.url).toBe('/upload/drive/v3/files');
        expect(upstream.params(0)).toEqual({ uploadType: 'multipart', supportsAllDrives: true, fields: 'id,name,webViewLink' });

        const contentType = String(call?.headers.get('Content-Type'));
        const boundary = contentType.replace('multipart/related; boundary=', '');
        expect(boundary).toMatch(/^restbridge-/);
        expect(call?.data).toBe([
            `--${boundary}`,
            'Content-Type: application/json; charset=UTF-8',
            '',
            '{"name":"Weekly report","mimeType":"application/vnd.google-apps.document"}',
            `--${boundary}`,
            'Content-Type: text/markdown; charset=UTF-8',
            '',
            '# Weekly\n\n- item',
            `--${boundary}--`,
            '',
        ].join('\r\n'));
    });

    it('places the document in a folder found by name', async () => {
        const upstream = new FakeUpstream([
            ok({ files: [{ id: 'folder-9', name: 'Reports' }] }),
            ok({ id: 'doc-2', webViewLink: 'https://docs.example.test/doc-2' }),
        ]);

        const created = await service(upstream).createDocument('body', 'Notes', { folderName: 'Reports' }, newContext());

        expect(created).toEqual({ id: 'doc-2', url: 'https://docs.example.test/doc-2' });
        expect(upstream.params(0).q)
            .toBe("mimeType = 'application/vnd.google-apps.folder' and name = 'Reports' and trashed = false");
        expect(String(upstream.calls[1]?.data)).toContain('"parents":["folder-9"]');
    });

    it('fails when the folder does not exist', async () => {
        const upstream = new FakeUpstream([ok({ files: [] })]);
        await expect(service(upstream).createDocument('body', 'Notes', { folderName: 'Missing' }, newContext()))
            .rejects.toThrow(NotFoundError);
        expect(upstream.calls).toHaveLength(1);
    });

    it('rejects folder names the query grammar cannot quote', async () => {
        const upstream = new FakeUpstream([]);
        await expect(service(upstream).createDocument('body', 'Notes', { folderName: "Bob's" }, newContext()))
            .rejects.toThrow(InvalidQueryError);
        expect(upstream.calls).toHaveLength(0);
    });

    it('places the document in a folder given by id without a lookup', async () => {
        const upstream = new FakeUpstream([ok({ id: 'doc-3' })]);

        await service(upstream).createDocument('body', 'Notes', { folderId: 'folder-7' }, newContext());

        expect(upstream.calls).toHaveLength(1);
        expect(String(upstream.calls[0]?.data)).toContain('"parents":["folder-7"]');
    });

    it('refuses a folder id and a folder name together', async () => {
        const upstream = new FakeUpstream([]);
        await expect(service(upstream).createDocument('body', 'Notes', { folderId: 'f', folderName: 'Reports' }, newContext()))
            .rejects.toThrow(InvalidArgumentError);
        expect(upstream.calls).toHaveLength(0);
    });

    it('looks folders up only in My Drive when shared drives are excluded', async () => {
        const upstream = new FakeUpstream([ok({ files: [] })]);

        const id = await service(upstream).lookupFolder('Reports', newContext(), false);

        expect(id).toBeUndefined();
        expect(upstream.params(0)).toEqual({
            q: "mimeType = 'application/vnd.google-apps.folder' and name = 'Reports' and trashed = false",
            pageSize: 1,
            fields: 'files(id,name)',
        });
    });
});
