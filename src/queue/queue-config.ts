import { Queue, QueueEvents, Worker, type Job } from 'bullmq';
import { Redis } from 'ioredis';
import { getConfig } from '../config/env';
import { logger } from '../config/logger';
import type { LifecycleNotification } from '../types/notification';

export const EVALUATION_QUEUE = 'evaluation';
export const NOTIFICATIONS_QUEUE = 'notifications';

export interface EvaluationJobData {
    interviewId: number;
    turnId: number;
}

export interface EvaluationJobResult {
    evaluationId: number;
    outcome: string;
}

// Fields of a BullMQ job the worker reads
export type EvaluationJob = Pick<Job<EvaluationJobData>, 'id' | 'data' | 'attemptsMade'>;

export type EvaluationProcessor = (job: Job<EvaluationJobData>) => Promise<EvaluationJobResult>;

export interface IEvaluationQueue {
    enqueueEvaluation(data: EvaluationJobData): Promise<void>;
}

export interface INotificationQueue {
    add(name: string, data: LifecycleNotification): Promise<unknown>;
}

/**
 * Queue Configuration
 *
 * BullMQ setup for the evaluation pipeline and outgoing lifecycle
 * notifications. One Redis connection is shared by queues, events and the
 * worker.
 */
export class QueueConfig implements IEvaluationQueue {
    private redis: Redis;
    private evaluationQueue: Queue<EvaluationJobData>;
    private notificationQueue: Queue<LifecycleNotification>;
    private evaluationWorker: Worker<EvaluationJobData, EvaluationJobResult> | null = null;
    private queueEvents: QueueEvents;

    constructor() {
        const config = getConfig();

        // Redis connection
        this.redis = new Redis(config.redisUrl, {
            enableReadyCheck: false,
            maxRetriesPerRequest: null,
        });

        // Evaluation queue; retries back off exponentially
        this.evaluationQueue = new Queue<EvaluationJobData>(EVALUATION_QUEUE, {
            connection: this.redis,
            defaultJobOptions: {
                removeOnComplete: 100,
                removeOnFail: 50,
                attempts: config.evaluationQueue.maxAttempts,
                backoff: {
                    type: 'exponential',
                    delay: config.evaluationQueue.backoffMs,
                },
            },
        });

        // Consumed by the delivery service
        this.notificationQueue = new Queue<LifecycleNotification>(NOTIFICATIONS_QUEUE, {
            connection: this.redis,
            defaultJobOptions: {
                removeOnComplete: 100,
                removeOnFail: 50,
                attempts: 3,
                backoff: { type: 'exponential', delay: 2000 },
            },
        });

        // Queue events for monitoring
        this.queueEvents = new QueueEvents(EVALUATION_QUEUE, {
            connection: this.redis,
        });

        this.setupEventListeners();
    }

    getEvaluationQueue(): Queue<EvaluationJobData> {
        return this.evaluationQueue;
    }

    getNotificationQueue(): Queue<LifecycleNotification> {
        return this.notificationQueue;
    }

    /**
     * Queue judging of an answered turn. The job id is derived from the
     * turn, so a turn waiting in the queue is never queued twice.
     */
    async enqueueEvaluation(data: EvaluationJobData): Promise<void> {
        const job = await this.evaluationQueue.add('evaluate-turn', data, {
            jobId: `turn-${data.turnId}`
        });
        logger.info({ jobId: job.id, ...data, queueName: EVALUATION_QUEUE }, 'Evaluation job added to queue');
    }

    /**
     * Start the evaluation worker
     */
    startWorker(processor: EvaluationProcessor): void {
        this.evaluationWorker = new Worker<EvaluationJobData, EvaluationJobResult>(EVALUATION_QUEUE, processor, {
            connection: this.redis,
            concurrency: 4, // Aggregations of one interview are serialized by the consistency guard
        });

        this.evaluationWorker.on('completed', (job) => {
            logger.info({
                jobId: job.id,
                jobName: job.name,
                duration: job.processedOn ? job.processedOn - job.timestamp : undefined
            }, 'Evaluation job completed');
        });

        this.evaluationWorker.on('failed', (job, err) => {
            logger.error({
                jobId: job?.id,
                jobName: job?.name,
                error: err.message,
                attempts: job?.attemptsMade
            }, 'Evaluation job failed');
        });

        this.evaluationWorker.on('stalled', (jobId) => {
            logger.warn({ jobId }, 'Evaluation job stalled');
        });
    }

    /**
     * Setup queue event listeners
     */
    private setupEventListeners(): void {
        this.queueEvents.on('active', ({ jobId }) => {
            logger.debug({ jobId }, 'Job started processing');
        });

        this.queueEvents.on('failed', ({ jobId, failedReason }) => {
            logger.error({ jobId, failedReason }, 'Job failed');
        });
    }

    /**
     * Close all connections
     */
    async close(): Promise<void> {
        await this.evaluationWorker?.close();
        await this.evaluationQueue.close();
        await this.notificationQueue.close();
        await this.queueEvents.close();
        await this.redis.quit();
    }
}

// Singleton instance
let queueConfig: QueueConfig | null = null;

export function getQueueConfig(): QueueConfig {
    if (!queueConfig) {
        queueConfig = new QueueConfig();
    }
    return queueConfig;
}
