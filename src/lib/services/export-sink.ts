/**
 * Export Sink Client
 *
 * Pushes the matched devices of a pass to the document service: the current
 * job is the first document of the resource whose status is in process, and
 * the batch is written as a JSON string into one field of it.
 */

import { z } from 'zod';
import type { MatchRecord } from '@/types';
import type { AppError } from '../errors/types';
import { ErrorCode, createAppError, failWith } from '../errors/types';
import { attemptRecovery, classifyTransportError } from '../errors/recovery';
import { logger } from '../logger';

export type ExportEntry = Record<string, string>;

export interface ExportSinkOptions {
    baseUrl: string;
    resource: string;
    token?: string;
    outputField: string;
    jobStatus: string;
    timeoutMs: number;
    maxRetries?: number;
    retryBaseDelay?: number;
    fetchImpl?: typeof fetch;
}

export interface ExportResult {
    ok: boolean;
    status: number;
    body: string;
    jobId: string | null;
    error?: AppError;
}

const JobListSchema = z.object({
    data: z.array(z.object({ name: z.string() }).passthrough())
});

export function serializeBatch(records: MatchRecord[]): ExportEntry[] {
    return records.map(record => ({
        BlockName: record.patternName,
        DEVICE_TAG: record.tag,
        ...record.attributes
    }));
}

// Status and body of a rejected lookup travel in the error context.
function failure(error: AppError, jobId: string | null = null): ExportResult {
    const { status, body } = error.context;
    return {
        ok: false,
        status: typeof status === 'number' ? status : 0,
        body: typeof body === 'string' ? body : error.message,
        jobId,
        error
    };
}

export class ExportSinkClient {
    private readonly options: ExportSinkOptions;
    private readonly fetchImpl: typeof fetch;

    constructor(options: ExportSinkOptions) {
        this.options = options;
        this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
    }

    private resourceUrl(): string {
        return `${this.options.baseUrl.replace(/\/+$/, '')}/${encodeURIComponent(this.options.resource)}`;
    }

    private headers(): Record<string, string> {
        const headers: Record<string, string> = { 'Content-Type': 'application/json' };
        if (this.options.token) headers.Authorization = `token ${this.options.token}`;
        return headers;
    }

    /**
     * Name of the first job in the configured status, or null when there is none.
     */
    async fetchCurrentJobId(): Promise<string | null> {
        const query = new URLSearchParams({
            fields: JSON.stringify(['*']),
            filters: JSON.stringify([['status', '=', this.options.jobStatus]])
        });

        const response = await this.fetchImpl(`${this.resourceUrl()}?${query.toString()}`, {
            method: 'GET',
            headers: this.headers(),
            signal: AbortSignal.timeout(this.options.timeoutMs)
        });

        const text = await response.text();
        if (!response.ok) {
            throw failWith(ErrorCode.EXPORT_REJECTED, `Job lookup failed with status ${response.status}`, { status: response.status, body: text });
        }

        let json: unknown;
        try {
            json = JSON.parse(text);
        } catch (error) {
            throw failWith(ErrorCode.EXPORT_REJECTED, 'Job lookup returned invalid JSON', { status: response.status, body: text }, error);
        }

        const parsed = JobListSchema.safeParse(json);
        if (!parsed.success) {
            throw failWith(ErrorCode.EXPORT_REJECTED, 'Job lookup returned an unexpected shape', { status: response.status, body: text });
        }

        return parsed.data.data[0]?.name ?? null;
    }

    private async sendBatch(batch: ExportEntry[]): Promise<ExportResult> {
        const jobId = await this.fetchCurrentJobId();
        if (!jobId) {
            return failure(createAppError(ErrorCode.EXPORT_NO_JOB, `No ${this.options.jobStatus} job found`));
        }

        const response = await this.fetchImpl(`${this.resourceUrl()}/${encodeURIComponent(jobId)}`, {
            method: 'PATCH',
            headers: this.headers(),
            body: JSON.stringify({ [this.options.outputField]: JSON.stringify(batch, null, 2) }),
            signal: AbortSignal.timeout(this.options.timeoutMs)
        });

        const body = await response.text();
        if (!response.ok) {
            return {
                ok: false,
                status: response.status,
                body,
                jobId,
                error: createAppError(ErrorCode.EXPORT_REJECTED, `Export rejected with status ${response.status}`, { status: response.status })
            };
        }

        return { ok: true, status: response.status, body, jobId };
    }

    /**
     * Never throws: rejections and exhausted retries come back as a failed result.
     */
    async pushBatch(batch: ExportEntry[]): Promise<ExportResult> {
        logger.info(`[Export] Pushing ${batch.length} device(s) to ${this.options.resource}`);

        let result: ExportResult;
        try {
            result = await this.sendBatch(batch);
        } catch (err) {
            const error = classifyTransportError(err);
            logger.warn(`[Export] ${error.message}`, { code: error.code });

            const recovery = await attemptRecovery(error, {
                operation: () => this.sendBatch(batch),
                maxRetries: this.options.maxRetries,
                baseDelay: this.options.retryBaseDelay
            });
            result = recovery.success && recovery.data ? recovery.data : failure(recovery.error ?? error);
        }

        if (result.ok) {
            logger.info(`[Export] Job ${result.jobId} updated`, { status: result.status });
        } else {
            logger.error(`[Export] ${result.error?.message ?? 'Export failed'}`, { status: result.status, body: result.body });
        }
        return result;
    }
}
