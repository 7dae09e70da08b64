import express, { Request, Response } from "express";
import type { ILogger } from "./config/logger";
import type { IEvaluationQueue } from "./queue/queue-config";
import { createApplicationRoutes } from "./routes/applications";
import { createSessionRoutes, createTurnRoutes } from "./routes/chat";
import { createInterviewRoutes } from "./routes/interviews";
import type { IAggregator } from "./services/aggregator.service";
import type { IChatLedger } from "./services/chat-ledger.service";
import type { IConsistencyGuard } from "./services/consistency-guard.service";
import type { IEvaluationStore } from "./services/evaluation-store.service";
import type { ILifecycleCoordinator } from "./services/lifecycle-coordinator.service";

export interface AppServices {
    coordinator: ILifecycleCoordinator;
    ledger: IChatLedger;
    evaluations: IEvaluationStore;
    aggregator: IAggregator;
    guard: IConsistencyGuard;
    evaluationQueue: IEvaluationQueue;
    logger: ILogger;
}

/**
 * Build the HTTP application over already-wired services.
 */
export function createApp(services: AppServices): express.Express {
    const app = express();

    // Middleware
    app.use(express.json());

    // Routes
    app.use("/applications", createApplicationRoutes(services));
    app.use("/interviews", createInterviewRoutes(services));
    app.use("/interviews/:id", createSessionRoutes(services));
    app.use("/turns", createTurnRoutes(services));

    // Health check
    app.get("/health", (req: Request, res: Response) => {
        res.json({ status: "ok", timestamp: new Date().toISOString() });
    });

    return app;
}
