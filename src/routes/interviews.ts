import { Router, Request, Response } from "express";
import { z } from "zod";
import type { AppServices } from "../app";
import { idParam, sendError, sendJoinError } from "./http-errors";
import {
    actorSchema,
    completionSchema,
    createInterviewSchema,
    interviewEventSchema,
    joinSchema
} from "./schemas";

const transitionSchema = z.object({
    event: interviewEventSchema,
    actor: actorSchema
});

export function createInterviewRoutes(services: AppServices): Router {
    const { coordinator, aggregator, guard, evaluations, logger } = services;
    const router = Router();

    /**
     * POST /interviews
     *
     * Body: { applicationId: number, scheduledById: string, type: InterviewType }
     */
    router.post('/', async (req: Request, res: Response) => {
        try {
            const { applicationId, scheduledById, type } = createInterviewSchema.parse(req.body);
            const interview = await coordinator.createInterview(applicationId, scheduledById, type);
            res.status(201).json(interview);
        } catch (error) {
            sendError(res, error, logger, 'Create interview');
        }
    });

    router.get('/:id', async (req: Request, res: Response) => {
        try {
            const interview = await coordinator.getInterview(idParam.parse(req.params.id));
            res.json(interview);
        } catch (error) {
            sendError(res, error, logger, 'Get interview');
        }
    });

    router.delete('/:id', async (req: Request, res: Response) => {
        try {
            await coordinator.deleteInterview(idParam.parse(req.params.id));
            res.status(204).end();
        } catch (error) {
            sendError(res, error, logger, 'Delete interview');
        }
    });

    /**
     * POST /interviews/:id/transitions
     *
     * Body: { event: InterviewEvent, actor?: { id, role? } }
     * Returns: { id, status }
     */
    router.post('/:id/transitions', async (req: Request, res: Response) => {
        try {
            const interviewId = idParam.parse(req.params.id);
            const { event, actor } = transitionSchema.parse(req.body);
            const status = await coordinator.transitionInterview(interviewId, event, actor);
            res.json({ id: interviewId, status });
        } catch (error) {
            sendError(res, error, logger, 'Interview transition');
        }
    });

    /**
     * POST /interviews/:id/join
     *
     * Candidate-facing. Body: { token: string }
     * Every token failure is the same 401.
     */
    router.post('/:id/join', async (req: Request, res: Response) => {
        try {
            const interviewId = idParam.parse(req.params.id);
            const { token } = joinSchema.parse(req.body);
            const status = await coordinator.joinInterview(interviewId, token);
            res.json({ id: interviewId, status });
        } catch (error) {
            sendJoinError(res, error, logger);
        }
    });

    router.post('/:id/aggregate', async (req: Request, res: Response) => {
        try {
            const outcome = await guard.aggregate(idParam.parse(req.params.id));
            res.json(outcome);
        } catch (error) {
            sendError(res, error, logger, 'Aggregate interview');
        }
    });

    /**
     * POST /interviews/:id/complete
     *
     * Aggregates and completes atomically.
     * Body: { feedback?: string, rating?: number, actor?: { id, role? } }
     */
    router.post('/:id/complete', async (req: Request, res: Response) => {
        try {
            const interviewId = idParam.parse(req.params.id);
            const { actor, ...completion } = completionSchema.parse(req.body ?? {});
            const completed = await guard.aggregateAndComplete(interviewId, completion, actor);
            res.json(completed);
        } catch (error) {
            sendError(res, error, logger, 'Complete interview');
        }
    });

    router.get('/:id/result', async (req: Request, res: Response) => {
        try {
            const result = await aggregator.getResult(idParam.parse(req.params.id));
            res.json(result);
        } catch (error) {
            sendError(res, error, logger, 'Get interview result');
        }
    });

    router.get('/:id/evaluations', async (req: Request, res: Response) => {
        try {
            const interviewId = idParam.parse(req.params.id);
            // Distinguishes an unknown interview from one without evaluations
            await coordinator.getInterview(interviewId);
            res.json(await evaluations.listByInterview(interviewId));
        } catch (error) {
            sendError(res, error, logger, 'List evaluations');
        }
    });

    return router;
}
