import { BatchResult } from '../processing/batchProcessor.js';

export interface WebhookStatsSnapshot {
    startedAt: string;
    uptimeSeconds: number;
    responsesByCode: Record<string, number>;
    batches: number;
    transactions: {
        processed: number;
        duplicates: number;
        validationFailed: number;
        processingErrors: number;
    };
}

/**
 * In-process counters served by GET /metrics. Per instance; reset on restart.
 */
export class WebhookStats {
    private readonly startedAtMs: number;
    private readonly responses = new Map<string, number>();
    private batches = 0;
    private processed = 0;
    private duplicates = 0;
    private validationFailed = 0;
    private processingErrors = 0;

    constructor(private readonly clock: () => number = Date.now) {
        this.startedAtMs = clock();
    }

    recordResponse(code: string): void {
        this.responses.set(code, (this.responses.get(code) ?? 0) + 1);
    }

    recordBatch(result: BatchResult): void {
        this.batches++;
        for (const outcome of result.outcomes) {
            switch (outcome.kind) {
                case 'SUCCESS': this.processed++; break;
                case 'DUPLICATE_REJECTED': this.duplicates++; break;
                case 'VALIDATION_FAILED': this.validationFailed++; break;
                case 'PROCESSING_ERROR': this.processingErrors++; break;
            }
        }
    }

    snapshot(): WebhookStatsSnapshot {
        return {
            startedAt: new Date(this.startedAtMs).toISOString(),
            uptimeSeconds: Math.floor((this.clock() - this.startedAtMs) / 1000),
            responsesByCode: Object.fromEntries(this.responses),
            batches: this.batches,
            transactions: {
                processed: this.processed,
                duplicates: this.duplicates,
                validationFailed: this.validationFailed,
                processingErrors: this.processingErrors
            }
        };
    }
}
