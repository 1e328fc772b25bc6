import type { Logger } from 'pino';
import axios from 'axios';
import type { AxiosAdapter, AxiosInstance, AxiosResponse } from 'axios';
import { AuthContext } from './auth.context.js';
import { NotFoundError, UpstreamRejectedError, UpstreamUnavailableError } from '../core/errors.js';
import type { ExecutionContext } from '../core/execution.context.js';

export type UpstreamId = 'dci' | 'jira' | 'drive';

export type QueryParams = Record<string, string | number | boolean | undefined>;

export interface UpstreamRequest {
    method?: 'GET' | 'POST';
    path: string;
    params?: QueryParams;
    data?: unknown;
    headers?: Record<string, string>;
    responseType?: 'json' | 'text' | 'arraybuffer';
}

export interface HttpClientOptions {
    timeoutMs: number;
    /** Replaces axios' network adapter; used to keep tests in-process. */
    adapter?: AxiosAdapter;
}

function describeBody(data: unknown): string | undefined {
    if (typeof data === 'string') {
        return data.length > 0 ? data.slice(0, 200) : undefined;
    }
    if (typeof data !== 'object' || data === null) {
        return undefined;
    }
    const message = 'message' in data ? data.message : undefined;
    if (typeof message === 'string') {
        return message;
    }
    const errorMessages = 'errorMessages' in data ? data.errorMessages : undefined;
    if (Array.isArray(errorMessages) && errorMessages.length > 0) {
        return errorMessages.map(String).join('; ');
    }
    return undefined;
}

/**
 * One upstream base URL, one auth context, no retries. Non-2xx statuses and
 * transport failures are turned into the bridge error taxonomy.
 */
export class HttpClient {
    private logger: Logger;
    private http: AxiosInstance;
    readonly upstreamId: UpstreamId;
    readonly baseUrl: string;

    constructor(logger: Logger, upstreamId: UpstreamId, baseUrl: string, auth: AuthContext, options: HttpClientOptions) {
        this.logger = logger.child({ upstreamId });
        this.upstreamId = upstreamId;
        this.baseUrl = baseUrl.replace(/\/$/, '');
        this.http = axios.create({
            baseURL: this.baseUrl,
            timeout: options.timeoutMs,
            headers: {
                'Accept': 'application/json',
                ...auth.authHeaders(),
            },
            // Status codes are mapped below rather than thrown by axios
            validateStatus: () => true,
            adapter: options.adapter,
        });
    }

    async request(req: UpstreamRequest, context?: ExecutionContext): Promise<unknown> {
        const method = req.method ?? 'GET';
        const logger = context ? context.logger.child({ upstreamId: this.upstreamId }) : this.logger;

        let response: AxiosResponse<unknown>;
        try {
            logger.debug({ method, path: req.path, params: req.params }, 'Calling upstream');
            response = await this.http.request<unknown>({
                method,
                url: req.path,
                params: req.params,
                data: req.data,
                headers: {
                    ...(context ? { 'X-Correlation-Id': context.correlationId } : {}),
                    ...req.headers,
                },
                responseType: req.responseType ?? 'json',
            });
        } catch (err) {
            const message = err instanceof Error ? err.message : String(err);
            logger.error({ err: message, path: req.path }, 'Upstream unreachable');
            throw new UpstreamUnavailableError(`${this.upstreamId} request failed: ${message}`, undefined, { cause: err });
        }

        const { status } = response;
        if (status >= 200 && status < 300) {
            return response.data;
        }

        const detail = describeBody(response.data);
        const message = `${this.upstreamId} responded ${status} for ${method} ${req.path}${detail ? `: ${detail}` : ''}`;
        logger.warn({ status, path: req.path }, 'Upstream returned an error status');

        if (status === 404) {
            throw new NotFoundError(message);
        }
        if (status >= 400 && status < 500) {
            throw new UpstreamRejectedError(message, status);
        }
        throw new UpstreamUnavailableError(message, status);
    }

    async getJson(path: string, params?: QueryParams, context?: ExecutionContext): Promise<unknown> {
        return this.request({ path, params }, context);
    }

    async getText(path: string, context?: ExecutionContext): Promise<string> {
        const data = await this.request({ path, responseType: 'text', headers: { 'Accept': '*/*' } }, context);
        return typeof data === 'string' ? data : JSON.stringify(data);
    }

    async getBytes(path: string, context?: ExecutionContext): Promise<Buffer> {
        const data = await this.request({ path, responseType: 'arraybuffer', headers: { 'Accept': '*/*' } }, context);
        if (Buffer.isBuffer(data)) return data;
        if (data instanceof ArrayBuffer) return Buffer.from(data);
        if (typeof data === 'string') return Buffer.from(data, 'utf-8');
        return Buffer.from(JSON.stringify(data), 'utf-8');
    }
}
