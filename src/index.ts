#!/usr/bin/env node
import { Command } from 'commander';
import fs from 'node:fs';
import type { Logger } from 'pino';
import { ConfigService } from './core/config.service.js';
import type { AppConfig } from './core/interfaces/app.config.js';
import { createLogger, loggerStorage } from './core/logger.js';
import { buildDefaultMiddleware } from './core/middleware/middleware.builder.js';
import { RequestController } from './core/request.controller.js';
import { PromptRegistry } from './prompts/prompt.registry.js';
import { registerRcaPrompt } from './prompts/rca.prompt.js';
import { ResourceRegistry } from './resources/resource.registry.js';
import { createToolRegistry } from './tools/index.js';
import type { ToolRegistry } from './tools/index.js';
import { StdioTransport } from './transport/stdio.transport.js';
import { AuthContext } from './upstream/auth.context.js';
import { HttpClient } from './upstream/http.client.js';
import type { UpstreamId } from './upstream/http.client.js';

const UPSTREAM_IDS: UpstreamId[] = ['dci', 'jira', 'drive'];

function readVersion(): string {
    const pkgPath = new URL('../package.json', import.meta.url);
    if (!fs.existsSync(pkgPath)) return '0.0.0';
    const pkg: unknown = JSON.parse(fs.readFileSync(pkgPath, 'utf-8'));
    return typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string'
        ? pkg.version
        : '0.0.0';
}

const version = readVersion();
const program = new Command();

program
    .name('restbridge')
    .description('MCP tool server bridging DCI, Jira and Google Drive REST APIs')
    .version(version);

program
    .command('serve', { isDefault: true })
    .description('Serve tools over stdio')
    .option('--config <path>', 'Path to config file')
    .action(async (options: { config?: string }) => {
        try {
            await startServer(options);
        } catch (err) {
            process.stderr.write(`Failed to start restbridge: ${err instanceof Error ? err.message : String(err)}\n`);
            process.exit(1);
        }
    });

program
    .command('tools')
    .description('List the tools this server exposes')
    .option('--config <path>', 'Path to config file')
    .action((options: { config?: string }) => {
        if (options.config) process.env.CONFIG_FILE = options.config;
        const configService = new ConfigService();
        const tools = buildTools(configService.all, createLogger(configService));
        for (const tool of tools.list()) {
            process.stdout.write(`${tool.name}\t${tool.description}\n`);
        }
    });

function buildTools(config: AppConfig, logger: Logger): ToolRegistry {
    const clients = {
        dci: createClient(config, logger, 'dci'),
        jira: createClient(config, logger, 'jira'),
        drive: createClient(config, logger, 'drive'),
    };
    return createToolRegistry({
        logger,
        resources: ResourceRegistry.load(),
        clients,
        pagination: config.pagination,
    });
}

function createClient(config: AppConfig, logger: Logger, id: UpstreamId): HttpClient {
    const upstream = config.upstreams[id];
    return new HttpClient(logger, id, upstream.url, AuthContext.fromCredentials(upstream.credentials), {
        timeoutMs: config.requestTimeoutMs,
    });
}

async function startServer(options: { config?: string }) {
    if (options.config) process.env.CONFIG_FILE = options.config;

    const configService = new ConfigService();
    const logger = createLogger(configService);
    const config = configService.all;

    await loggerStorage.run({ correlationId: 'system' }, async () => {
        for (const id of UPSTREAM_IDS) {
            const upstream = config.upstreams[id];
            if (!upstream.credentials) {
                logger.warn({ upstreamId: id, url: upstream.url }, 'No credentials configured; calls will be anonymous');
            }
        }

        const tools = buildTools(config, logger);
        const prompts = new PromptRegistry();
        registerRcaPrompt(prompts, { jiraUrl: config.upstreams.jira.url });
        const requestController = new RequestController(
            logger,
            tools,
            prompts,
            { name: 'restbridge', version },
            buildDefaultMiddleware()
        );

        const transport = new StdioTransport(logger, requestController);
        await transport.start();

        logger.info({ toolCount: tools.list().length }, 'restbridge server started');

        // Handle graceful shutdown
        const shutdown = async () => {
            logger.info('Shutting down...');
            await transport.close();
            process.exit(0);
        };

        process.on('SIGINT', shutdown);
        process.on('SIGTERM', shutdown);
    });
}

program.parseAsync(process.argv).catch((err: unknown) => {
    process.stderr.write(`${err instanceof Error ? err.message : String(err)}\n`);
    process.exit(1);
});
