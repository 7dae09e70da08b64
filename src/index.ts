import { createApp } from "./app";
import { getConfig } from "./config/env";
import { errorFields, logger } from "./config/logger";
import { AppDataSource } from "./db/data-source";
import { getQueueConfig } from "./queue/queue-config";
import { AggregatorService } from "./services/aggregator.service";
import { getAnswerJudge } from "./services/answer-judge.service";
import { getChatLedger } from "./services/chat-ledger.service";
import { ConsistencyGuardService } from "./services/consistency-guard.service";
import { getEvaluationStore } from "./services/evaluation-store.service";
import { LifecycleCoordinatorService } from "./services/lifecycle-coordinator.service";
import { NarrativeGeneratorService } from "./services/narrative-generator.service";
import { NotificationDispatcherService } from "./services/notification-dispatcher.service";
import { EvaluationWorker } from "./workers/evaluation-worker";

// Initialize database and start server
async function startServer(): Promise<void> {
    try {
        // Fails here on invalid configuration
        const config = getConfig();

        // Initialize database connection
        await AppDataSource.initialize();
        logger.info({}, "Database connection established");

        const queueConfig = getQueueConfig();
        const coordinator = LifecycleCoordinatorService.create(NotificationDispatcherService.create());
        const aggregator = AggregatorService.create(NarrativeGeneratorService.create());
        const guard = ConsistencyGuardService.create(aggregator, coordinator);
        const ledger = getChatLedger();
        const evaluations = getEvaluationStore();

        // Initialize queue system
        const worker = new EvaluationWorker(ledger, getAnswerJudge(), evaluations, guard, logger);
        queueConfig.startWorker((job) => worker.processEvaluation(job));
        logger.info({}, "Queue system initialized and worker started");

        const app = createApp({
            coordinator,
            ledger,
            evaluations,
            aggregator,
            guard,
            evaluationQueue: queueConfig,
            logger
        });

        // Start server
        const server = app.listen(config.port, () => {
            logger.info({ port: config.port }, `Server running at http://localhost:${config.port}`);
        });

        const shutdown = async (signal: string): Promise<void> => {
            logger.info({ signal }, "Shutting down");
            server.close();
            await queueConfig.close();
            await AppDataSource.destroy();
            process.exit(0);
        };
        for (const signal of ["SIGINT", "SIGTERM"]) {
            process.once(signal, () => {
                shutdown(signal).catch((error: unknown) => {
                    logger.error(errorFields(error), "Shutdown failed");
                    process.exit(1);
                });
            });
        }
    } catch (error) {
        logger.error(errorFields(error), "Failed to start server");
        process.exit(1);
    }
}

void startServer();
