import { Queue, Worker, QueueEvents, type Processor } from 'bullmq';
import { Redis } from 'ioredis';
import { logger } from '../config/logger';
import { getConfig } from '../config/env';
import type { EvaluationJobData, EvaluationJobResult } from '../types/evaluation';

export const EVALUATION_QUEUE = 'evaluation';

export interface QueueSettings {
    redisUrl: string;
    maxAttempts: number;
    backoffMs: number;
    concurrency: number;
}

export type EvaluationProcessor = Processor<EvaluationJobData, EvaluationJobResult>;

/**
 * Queue Configuration
 *
 * BullMQ setup for async evaluation processing.
 * Handles job queuing, processing, and monitoring.
 */
export class QueueConfig {
    private redis: Redis;
    private evaluationQueue: Queue<EvaluationJobData, EvaluationJobResult>;
    private evaluationWorker: Worker<EvaluationJobData, EvaluationJobResult> | null = null;
    private queueEvents: QueueEvents;

    constructor(private settings: QueueSettings) {
        // Redis connection
        this.redis = new Redis(settings.redisUrl, {
            enableReadyCheck: false,
            maxRetriesPerRequest: null,
        });

        // Evaluation queue
        this.evaluationQueue = new Queue<EvaluationJobData, EvaluationJobResult>(EVALUATION_QUEUE, {
            connection: this.redis,
            defaultJobOptions: {
                removeOnComplete: 10,
                removeOnFail: 5,
                attempts: settings.maxAttempts,
                backoff: {
                    type: 'exponential',
                    delay: settings.backoffMs,
                },
            },
        });

        // Queue events for monitoring
        this.queueEvents = new QueueEvents(EVALUATION_QUEUE, {
            connection: this.redis,
        });

        this.setupEventListeners();
    }

    /**
     * Get the evaluation queue instance
     */
    getEvaluationQueue(): Queue<EvaluationJobData, EvaluationJobResult> {
        return this.evaluationQueue;
    }

    /**
     * Start the evaluation worker
     */
    startWorker(processor: EvaluationProcessor): Worker<EvaluationJobData, EvaluationJobResult> {
        const worker = new Worker<EvaluationJobData, EvaluationJobResult>(EVALUATION_QUEUE, processor, {
            connection: this.redis,
            concurrency: this.settings.concurrency,
        });

        worker.on('completed', (job) => {
            logger.info({
                jobId: job.data.jobId,
                queueJobId: job.id,
                runId: job.returnvalue.runId,
                duration: job.processedOn === undefined ? undefined : job.processedOn - job.timestamp
            }, 'Evaluation job completed');
        });

        worker.on('failed', (job, err) => {
            logger.error({
                jobId: job?.data.jobId,
                queueJobId: job?.id,
                error: err.message,
                attempts: job?.attemptsMade
            }, 'Evaluation job failed');
        });

        worker.on('stalled', (jobId) => {
            logger.warn({ queueJobId: jobId }, 'Evaluation job stalled');
        });

        this.evaluationWorker = worker;
        return worker;
    }

    /**
     * Setup queue event listeners
     */
    private setupEventListeners() {
        this.queueEvents.on('waiting', ({ jobId }) => {
            logger.info({ queueJobId: jobId }, 'Job waiting in queue');
        });

        this.queueEvents.on('active', ({ jobId }) => {
            logger.info({ queueJobId: jobId }, 'Job started processing');
        });

        this.queueEvents.on('failed', ({ jobId, failedReason }) => {
            logger.error({ queueJobId: jobId, failedReason }, 'Job failed');
        });
    }

    /**
     * Close the worker, queue and Redis connection
     */
    async close(): Promise<void> {
        await this.evaluationWorker?.close();
        await this.evaluationQueue.close();
        await this.queueEvents.close();
        await this.redis.quit();
    }
}

// Singleton instance
let queueConfig: QueueConfig | null = null;

export function getQueueConfig(): QueueConfig {
    if (!queueConfig) {
        const config = getConfig();
        queueConfig = new QueueConfig({
            redisUrl: config.redisUrl,
            maxAttempts: config.queue.maxAttempts,
            backoffMs: config.queue.backoffMs,
            concurrency: config.queue.concurrency
        });
    }
    return queueConfig;
}
