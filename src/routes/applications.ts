import { Router, Request, Response } from "express";
import { z } from "zod";
import type { AppServices } from "../app";
import { idParam, sendError } from "./http-errors";
import { actorSchema, applicationEventSchema, createApplicationSchema } from "./schemas";

const transitionSchema = z.object({
    event: applicationEventSchema,
    actor: actorSchema
});

export function createApplicationRoutes({ coordinator, logger }: AppServices): Router {
    const router = Router();

    /**
     * POST /applications
     *
     * Body: { jobId: string, candidateId: string }
     * Returns the application of the pair, creating it on first use.
     */
    router.post('/', async (req: Request, res: Response) => {
        try {
            const { jobId, candidateId } = createApplicationSchema.parse(req.body);
            const application = await coordinator.createApplication(jobId, candidateId);
            res.status(201).json(application);
        } catch (error) {
            sendError(res, error, logger, 'Create application');
        }
    });

    router.get('/:id', async (req: Request, res: Response) => {
        try {
            const application = await coordinator.getApplication(idParam.parse(req.params.id));
            res.json(application);
        } catch (error) {
            sendError(res, error, logger, 'Get application');
        }
    });

    /**
     * POST /applications/:id/transitions
     *
     * Body: { event: { type, decidedBy? }, actor?: { id, role? } }
     * Returns: { id, status }
     */
    router.post('/:id/transitions', async (req: Request, res: Response) => {
        try {
            const applicationId = idParam.parse(req.params.id);
            const { event, actor } = transitionSchema.parse(req.body);
            const status = await coordinator.transitionApplication(applicationId, event, actor);
            res.json({ id: applicationId, status });
        } catch (error) {
            sendError(res, error, logger, 'Application transition');
        }
    });

    return router;
}
