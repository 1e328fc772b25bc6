import { z } from 'zod';
import dotenv from 'dotenv';
import fs from 'node:fs';
import path from 'node:path';
import yaml from 'js-yaml';
import type { AppConfig } from './interfaces/app.config.js';

dotenv.config({ quiet: true });

export const CredentialsSchema = z.discriminatedUnion('type', [
    z.object({
        type: z.literal('apiKey'),
        apiKey: z.string().min(1),
        headerName: z.string().optional(),
    }),
    z.object({
        type: z.literal('userPassword'),
        username: z.string().min(1),
        password: z.string().min(1),
    }),
]);

const upstreamSchema = (defaultUrl: string) => z.object({
    url: z.string().url().default(defaultUrl),
    credentials: CredentialsSchema.optional(),
}).default({});

export const PaginationSchema = z.object({
    defaultPageSize: z.number().int().positive().default(50),
    hardCap: z.number().int().positive().default(1000),
    maxPages: z.number().int().positive().default(100),
});

export const ConfigSchema = z.object({
    nodeEnv: z.enum(['development', 'production', 'test']).default('development'),
    logLevel: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
    secretRedactionPatterns: z.array(z.string()).default([
        'Bearer [A-Za-z0-9._~+/=-]+',
        'Basic [A-Za-z0-9+/=]+',
    ]),
    requestTimeoutMs: z.union([z.string(), z.number()]).default(30000).transform((v) => Number(v)).pipe(z.number().int().positive()),
    pagination: PaginationSchema.default({}),
    upstreams: z.object({
        dci: upstreamSchema('https://api.distributed-ci.io'),
        jira: upstreamSchema('https://issues.redhat.com'),
        drive: upstreamSchema('https://www.googleapis.com'),
    }).default({}),
});

export type Credentials = z.infer<typeof CredentialsSchema>;
export type UpstreamConfig = z.infer<ReturnType<typeof upstreamSchema>>;
export type PaginationLimits = z.infer<typeof PaginationSchema>;

type Overrides = { [K in keyof AppConfig]?: unknown };
type PlainObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is PlainObject {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function deepMerge(base: PlainObject, patch: PlainObject): PlainObject {
    const out: PlainObject = { ...base };
    for (const [key, value] of Object.entries(patch)) {
        if (value === undefined) continue;
        const current = out[key];
        out[key] = isPlainObject(value) ? deepMerge(isPlainObject(current) ? current : {}, value) : value;
    }
    return out;
}

export class ConfigService {
    private config: AppConfig;

    constructor(overrides: Overrides = {}) {
        const fileConfig = this.loadConfigFile();
        const envConfig = this.loadEnvConfig();

        const mergedConfig = deepMerge(deepMerge(fileConfig, envConfig), overrides);

        const result = ConfigSchema.safeParse(mergedConfig);
        if (!result.success) {
            const error = result.error.format();
            throw new Error(`Invalid configuration: ${JSON.stringify(error, null, 2)}`);
        }

        this.config = result.data;
    }

    get<K extends keyof AppConfig>(key: K): AppConfig[K] {
        return this.config[key];
    }

    get all(): AppConfig {
        return { ...this.config };
    }

    private loadEnvConfig(): PlainObject {
        const env = process.env;
        const upstreams: PlainObject = {
            dci: {
                url: env.DCI_CS_URL || undefined,
                credentials: env.DCI_API_KEY
                    ? { type: 'apiKey', apiKey: env.DCI_API_KEY }
                    : env.DCI_LOGIN && env.DCI_PASSWORD
                        ? { type: 'userPassword', username: env.DCI_LOGIN, password: env.DCI_PASSWORD }
                        : undefined,
            },
            jira: {
                url: env.JIRA_URL || undefined,
                credentials: env.JIRA_API_TOKEN
                    ? env.JIRA_EMAIL
                        ? { type: 'userPassword', username: env.JIRA_EMAIL, password: env.JIRA_API_TOKEN }
                        : { type: 'apiKey', apiKey: env.JIRA_API_TOKEN }
                    : undefined,
            },
            drive: {
                url: env.DRIVE_URL || undefined,
                credentials: env.GOOGLE_ACCESS_TOKEN
                    ? { type: 'apiKey', apiKey: env.GOOGLE_ACCESS_TOKEN }
                    : undefined,
            },
        };

        return {
            nodeEnv: env.NODE_ENV || undefined,
            logLevel: env.LOG_LEVEL || undefined,
            requestTimeoutMs: env.REQUEST_TIMEOUT_MS || undefined,
            upstreams,
        };
    }

    private loadConfigFile(): PlainObject {
        const configPath = process.env.CONFIG_FILE ||
            (fs.existsSync(path.resolve(process.cwd(), 'restbridge.yaml')) ? 'restbridge.yaml' :
                (fs.existsSync(path.resolve(process.cwd(), 'restbridge.json')) ? 'restbridge.json' : null));

        if (!configPath) return {};

        const fullPath = path.resolve(process.cwd(), configPath);
        let fileContent: string;
        try {
            fileContent = fs.readFileSync(fullPath, 'utf-8');
        } catch (error) {
            throw new Error(`Failed to read config file ${configPath}: ${error instanceof Error ? error.message : String(error)}`);
        }

        // ${VAR} or ${VAR:-default}
        fileContent = fileContent.replace(/\$\{([a-zA-Z0-9_]+)(?::-([^}]+))?\}/g, (_match, varName: string, defaultValue: string | undefined) => {
            const value = process.env[varName];
            if (value !== undefined) {
                return value;
            }
            return defaultValue !== undefined ? defaultValue : '';
        });

        const parsed: unknown = configPath.endsWith('.yaml') || configPath.endsWith('.yml')
            ? yaml.load(fileContent)
            : JSON.parse(fileContent);

        if (parsed === undefined || parsed === null) return {};
        if (!isPlainObject(parsed)) {
            throw new Error(`Config file ${configPath} must contain an object`);
        }
        return parsed;
    }
}
