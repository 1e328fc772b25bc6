import type { DocumentService } from '../upstream/document.service.js';
import type { FileSource } from '../upstream/file.sink.js';
import type { ResourceRegistry } from '../resources/resource.registry.js';
import type { ListFacade } from './list.facade.js';
import type { ToolRegistry } from './tool.registry.js';
import { LIST_PROPERTIES, toolSuccess } from './tool.types.js';
import type { ListArgs } from './tool.types.js';

interface PlacementArgs {
    folder?: string;
    folder_id?: string;
}

interface CreateDocArgs extends PlacementArgs {
    content: string;
    title: string;
}

interface CreateDocFromFileArgs extends PlacementArgs {
    file_path: string;
    title?: string;
}

interface FindFolderArgs {
    folder_name: string;
    include_shared_drives?: boolean;
}

export interface DriveToolDeps {
    facade: ListFacade;
    resources: ResourceRegistry;
    documents: DocumentService;
    source: FileSource;
}

const PLACEMENT_PROPERTIES: Record<string, object> = {
    folder: { type: 'string', description: 'Name of the Drive folder to create the document in' },
    folder_id: { type: 'string', description: 'Id of the Drive folder to create the document in; not combined with folder' },
};

export function registerDriveTools(tools: ToolRegistry, deps: DriveToolDeps): void {
    const { facade, resources, documents, source } = deps;
    const descriptor = resources.get('document');

    tools.register<ListArgs>({
        definition: {
            name: 'list_google_docs',
            description: `List Google Docs. Paged by cursor, so offset must be 0. fullText only takes the like operator. Filterable and sortable fields: ${descriptor.fields.join(', ')}`,
            inputSchema: { type: 'object', properties: LIST_PROPERTIES, additionalProperties: false },
        },
        handler: async (args, context) => toolSuccess(await facade.listResource('document', args, context)),
    });

    tools.register<CreateDocArgs>({
        definition: {
            name: 'create_google_doc',
            description: 'Create a Google Doc from markdown content, optionally inside a folder given by name or id',
            inputSchema: {
                type: 'object',
                properties: {
                    content: { type: 'string', description: 'Markdown body' },
                    title: { type: 'string', description: 'Document title' },
                    ...PLACEMENT_PROPERTIES,
                },
                required: ['content', 'title'],
                additionalProperties: false,
            },
        },
        handler: async (args, context) => toolSuccess(await documents.createDocument(
            args.content,
            args.title,
            { folderName: args.folder, folderId: args.folder_id },
            context,
        )),
    });

    tools.register<CreateDocFromFileArgs>({
        definition: {
            name: 'create_google_doc_from_file',
            description: 'Create a Google Doc from a local markdown file; the title defaults to the file name',
            inputSchema: {
                type: 'object',
                properties: {
                    file_path: { type: 'string', description: 'Path of the markdown file to upload' },
                    title: { type: 'string', description: 'Document title' },
                    ...PLACEMENT_PROPERTIES,
                },
                required: ['file_path'],
                additionalProperties: false,
            },
        },
        handler: async (args, context) => {
            const file = await source.readText(args.file_path);
            const created = await documents.createDocument(
                file.content,
                args.title ?? file.stem,
                { folderName: args.folder, folderId: args.folder_id },
                context,
            );
            return toolSuccess(created);
        },
    });

    tools.register<FindFolderArgs>({
        definition: {
            name: 'find_folder_by_name',
            description: 'Find a Google Drive folder by its exact name',
            inputSchema: {
                type: 'object',
                properties: {
                    folder_name: { type: 'string', description: 'Folder name' },
                    include_shared_drives: { type: 'boolean', description: 'Also search shared drives (default true)' },
                },
                required: ['folder_name'],
                additionalProperties: false,
            },
        },
        handler: async (args, context) => {
            const includeShared = args.include_shared_drives ?? true;
            const folderId = await documents.lookupFolder(args.folder_name, context, includeShared);
            return toolSuccess(folderId
                ? { found: true, folder_id: folderId }
                : { found: false, message: `Folder "${args.folder_name}" not found in Google Drive${includeShared ? ' or shared drives' : ''}` });
        },
    });
}
