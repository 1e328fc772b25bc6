import { v4 as uuidv4 } from 'uuid';
import { InvalidArgumentError, NotFoundError, UpstreamUnavailableError } from '../core/errors.js';
import type { ExecutionContext } from '../core/execution.context.js';
import { QueryTranslator } from '../query/query.translator.js';
import type { TranslationTarget } from '../query/query.translator.js';
import { asRecord, stringOf } from '../resources/resource.normalizers.js';
import type { HttpClient } from './http.client.js';

export const GOOGLE_DOC_MIME = 'application/vnd.google-apps.document';
export const FOLDER_MIME = 'application/vnd.google-apps.folder';

const FOLDER_TARGET: TranslationTarget = {
    dialect: 'drive',
    fields: ['mimeType', 'name', 'trashed'],
    label: 'Google Drive folders',
};

export interface CreatedDocument {
    id: string;
    name?: string;
    url: string;
}

/** Where a new document goes: a folder id, or a folder name looked up first. */
export interface DocumentPlacement {
    folderId?: string;
    folderName?: string;
}

export function documentUrl(id: string): string {
    return `https://docs.google.com/document/d/${id}/edit`;
}

/**
 * Drive writes: markdown uploads converted to Google Docs, and folder
 * lookup by name.
 */
export class DocumentService {
    private client: HttpClient;
    private translator: QueryTranslator;

    constructor(client: HttpClient, translator: QueryTranslator) {
        this.client = client;
        this.translator = translator;
    }

    /** First folder with exactly this name, or undefined. */
    async lookupFolder(name: string, context: ExecutionContext, includeSharedDrives = true): Promise<string | undefined> {
        const q = this.translator.translate([
            { field: 'mimeType', operator: 'eq', value: FOLDER_MIME },
            { field: 'name', operator: 'eq', value: name },
            { field: 'trashed', operator: 'eq', value: 'false' },
        ], FOLDER_TARGET);

        const data = asRecord(await this.client.getJson('/drive/v3/files', {
            q,
            pageSize: 1,
            fields: 'files(id,name)',
            ...(includeSharedDrives ? { supportsAllDrives: true, includeItemsFromAllDrives: true } : {}),
        }, context));
        const files = data?.files;
        const first = Array.isArray(files) ? asRecord(files[0]) : undefined;
        return stringOf(first?.id);
    }

    async findFolder(name: string, context: ExecutionContext): Promise<string> {
        const id = await this.lookupFolder(name, context);
        if (!id) {
            throw new NotFoundError(`Folder "${name}" not found in Google Drive`);
        }
        return id;
    }

    async createDocument(content: string, title: string, placement: DocumentPlacement, context: ExecutionContext): Promise<CreatedDocument> {
        if (title.trim() === '') {
            throw new InvalidArgumentError('title must not be empty');
        }
        const { folderId, folderName } = placement;
        if (folderId && folderName) {
            throw new InvalidArgumentError('Pass either a folder name or a folder id, not both');
        }

        const parentId = folderName ? await this.findFolder(folderName, context) : folderId;
        const parents = parentId ? [parentId] : undefined;
        const metadata = { name: title, mimeType: GOOGLE_DOC_MIME, ...(parents ? { parents } : {}) };
        const boundary = `restbridge-${uuidv4()}`;
        const body = [
            `--${boundary}`,
            'Content-Type: application/json; charset=UTF-8',
            '',
            JSON.stringify(metadata),
            `--${boundary}`,
            'Content-Type: text/markdown; charset=UTF-8',
            '',
            content,
            `--${boundary}--`,
            '',
        ].join('\r\n');

        const created = asRecord(await this.client.request({
            method: 'POST',
            path: '/upload/drive/v3/files',
            params: { uploadType: 'multipart', supportsAllDrives: true, fields: 'id,name,webViewLink' },
            data: body,
            headers: { 'Content-Type': `multipart/related; boundary=${boundary}` },
        }, context));

        const id = stringOf(created?.id);
        if (!id) {
            throw new UpstreamUnavailableError('drive did not return an id for the created document');
        }
        context.logger.info({ documentId: id }, 'Created Google Doc');
        return { id, name: stringOf(created?.name), url: stringOf(created?.webViewLink) ?? documentUrl(id) };
    }
}
