import { InvalidArgumentError } from '../core/errors.js';
import type { ResourceKind, ResourceRegistry } from '../resources/resource.registry.js';
import { asRecord } from '../resources/resource.normalizers.js';
import type { FileSink } from '../upstream/file.sink.js';
import type { HttpClient } from '../upstream/http.client.js';
import type { JobLogService } from '../upstream/job.log.service.js';
import type { ListFacade } from './list.facade.js';
import type { ToolRegistry } from './tool.registry.js';
import { LIST_PROPERTIES, toolSuccess } from './tool.types.js';
import type { ListArgs } from './tool.types.js';

type DciKind = Extract<ResourceKind, 'job' | 'component' | 'file' | 'pipeline' | 'product' | 'team' | 'topic' | 'remoteci'>;

const DCI_KINDS: Record<DciKind, { plural: string; noun: string }> = {
    job: { plural: 'jobs', noun: 'job' },
    component: { plural: 'components', noun: 'component' },
    file: { plural: 'files', noun: 'file' },
    pipeline: { plural: 'pipelines', noun: 'pipeline' },
    product: { plural: 'products', noun: 'product' },
    team: { plural: 'teams', noun: 'team' },
    topic: { plural: 'topics', noun: 'topic' },
    remoteci: { plural: 'remotecis', noun: 'remote CI' },
};

const DCI_KIND_ORDER: DciKind[] = ['job', 'component', 'file', 'pipeline', 'product', 'team', 'topic', 'remoteci'];

interface ScopedTool {
    name: string;
    kind: DciKind;
    parent: DciKind;
    description: string;
}

const SCOPED_TOOLS: ScopedTool[] = [
    { name: 'list_job_files', kind: 'file', parent: 'job', description: 'List the files attached to a DCI job' },
    { name: 'list_pipeline_jobs', kind: 'job', parent: 'pipeline', description: 'List the jobs that ran in a DCI pipeline' },
    { name: 'list_topic_components', kind: 'component', parent: 'topic', description: 'List the components of a DCI topic' },
    { name: 'list_product_topics', kind: 'topic', parent: 'product', description: 'List the topics of a DCI product' },
];

type ScopedArgs = ListArgs & Record<string, unknown>;

interface IdArgs {
    id: string;
}

interface FileArgs {
    file_id: string;
}

interface JobArgs {
    job_id: string;
}

interface DownloadArgs extends FileArgs {
    output_path: string;
}

export interface DciToolDeps {
    facade: ListFacade;
    resources: ResourceRegistry;
    client: HttpClient;
    sink: FileSink;
    logs: JobLogService;
}

function requireId(value: unknown, name: string): string {
    if (typeof value !== 'string' || value.trim() === '') {
        throw new InvalidArgumentError(`${name} must be a non-empty string`);
    }
    return value.trim();
}

export function registerDciTools(tools: ToolRegistry, deps: DciToolDeps): void {
    const { facade, resources, client, sink, logs } = deps;

    for (const kind of DCI_KIND_ORDER) {
        const names = DCI_KINDS[kind];
        const descriptor = resources.get(kind);

        tools.register<ListArgs>({
            definition: {
                name: `list_dci_${names.plural}`,
                description: `List DCI ${names.noun}s. Filterable and sortable fields: ${descriptor.fields.join(', ')}`,
                inputSchema: { type: 'object', properties: LIST_PROPERTIES, additionalProperties: false },
            },
            handler: async (args, context) => toolSuccess(await facade.listResource(kind, args, context)),
        });

        tools.register<IdArgs>({
            definition: {
                name: `get_dci_${kind}`,
                description: `Get one DCI ${names.noun} by id`,
                inputSchema: {
                    type: 'object',
                    properties: { id: { type: 'string', description: `The ${names.noun} id` } },
                    required: ['id'],
                    additionalProperties: false,
                },
            },
            handler: async (args, context) => {
                const id = requireId(args.id, 'id');
                const data = await client.getJson(`${descriptor.path}/${encodeURIComponent(id)}`, undefined, context);
                const item = descriptor.itemKey ? asRecord(data)?.[descriptor.itemKey] : undefined;
                return toolSuccess(item ?? data);
            },
        });
    }

    for (const scoped of SCOPED_TOOLS) {
        const parentArg = `${scoped.parent}_id`;
        tools.register<ScopedArgs>({
            definition: {
                name: scoped.name,
                description: scoped.description,
                inputSchema: {
                    type: 'object',
                    properties: {
                        [parentArg]: { type: 'string', description: `The ${DCI_KINDS[scoped.parent].noun} id` },
                        ...LIST_PROPERTIES,
                    },
                    required: [parentArg],
                    additionalProperties: false,
                },
            },
            handler: async (args, context) => {
                const parentId = requireId(args[parentArg], parentArg);
                const { query, limit, offset, sort, fields } = args;
                const envelope = await facade.listResource(
                    scoped.kind,
                    { query, limit, offset, sort, fields },
                    context,
                    { kind: scoped.parent, id: parentId },
                );
                return toolSuccess(envelope);
            },
        });
    }

    tools.register<FileArgs>({
        definition: {
            name: 'get_dci_file_content',
            description: 'Get the text content of a DCI file',
            inputSchema: {
                type: 'object',
                properties: { file_id: { type: 'string', description: 'The file id' } },
                required: ['file_id'],
                additionalProperties: false,
            },
        },
        handler: async (args, context) => {
            const fileId = requireId(args.file_id, 'file_id');
            const content = await client.getText(`/api/v1/files/${encodeURIComponent(fileId)}/content`, context);
            return toolSuccess({ file_id: fileId, content });
        },
    });

    tools.register<DownloadArgs>({
        definition: {
            name: 'download_dci_file',
            description: 'Download a DCI file to a local path',
            inputSchema: {
                type: 'object',
                properties: {
                    file_id: { type: 'string', description: 'The file id' },
                    output_path: { type: 'string', description: 'Where to write the file' },
                },
                required: ['file_id', 'output_path'],
                additionalProperties: false,
            },
        },
        handler: async (args, context) => {
            const fileId = requireId(args.file_id, 'file_id');
            const bytes = await client.getBytes(`/api/v1/files/${encodeURIComponent(fileId)}/content`, context);
            const savedPath = await sink.save(bytes, args.output_path);
            context.logger.info({ fileId, path: savedPath, size: bytes.length }, 'Downloaded DCI file');
            return toolSuccess({ file_id: fileId, path: savedPath, size: bytes.length });
        },
    });

    const jobIdSchema = {
        type: 'object' as const,
        properties: { job_id: { type: 'string', description: 'The job id' } },
        required: ['job_id'],
        additionalProperties: false,
    };

    tools.register<JobArgs>({
        definition: {
            name: 'get_dci_job_logs',
            description: 'Get the log text of a DCI job',
            inputSchema: jobIdSchema,
        },
        handler: async (args, context) => toolSuccess(await logs.getLogs(requireId(args.job_id, 'job_id'), context)),
    });

    tools.register<JobArgs>({
        definition: {
            name: 'get_dci_job_artifacts',
            description: 'Get the artifacts recorded for a DCI job',
            inputSchema: jobIdSchema,
        },
        handler: async (args, context) => toolSuccess(await logs.getArtifacts(requireId(args.job_id, 'job_id'), context)),
    });
}
