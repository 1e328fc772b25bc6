import { NotFoundError } from '../core/errors.js';
import type { ExecutionContext } from '../core/execution.context.js';
import { asRecord, stringOf } from '../resources/resource.normalizers.js';
import type { HttpClient } from './http.client.js';

// Tried in order under the job's own path.
const LOG_ENDPOINTS = ['logs', 'artifacts/logs', 'output', 'console'];

export interface JobLogs {
    job_id: string;
    job_name: string;
    logs: string;
    log_path: string;
}

export interface JobArtifacts {
    job_id: string;
    artifacts: unknown;
}

export class JobLogService {
    private client: HttpClient;
    private jobsPath: string;

    constructor(client: HttpClient, jobsPath: string) {
        this.client = client;
        this.jobsPath = jobsPath;
    }

    async getLogs(jobId: string, context: ExecutionContext): Promise<JobLogs> {
        const jobPath = `${this.jobsPath}/${encodeURIComponent(jobId)}`;
        const data = asRecord(await this.client.getJson(jobPath, undefined, context));
        const job = asRecord(data?.job) ?? data;
        const jobName = stringOf(job?.name) ?? 'unknown';

        for (const endpoint of LOG_ENDPOINTS) {
            const logPath = `${jobPath}/${endpoint}`;
            try {
                const logs = await this.client.getText(logPath, context);
                return { job_id: jobId, job_name: jobName, logs, log_path: logPath };
            } catch (err) {
                if (!(err instanceof NotFoundError)) throw err;
                context.logger.debug({ jobId, logPath }, 'No logs at endpoint');
            }
        }
        throw new NotFoundError(`No logs found for DCI job ${jobId}`);
    }

    async getArtifacts(jobId: string, context: ExecutionContext): Promise<JobArtifacts> {
        const artifacts = await this.client.getJson(
            `${this.jobsPath}/${encodeURIComponent(jobId)}/artifacts`,
            undefined,
            context,
        );
        return { job_id: jobId, artifacts };
    }
}
