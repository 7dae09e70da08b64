import { Router, Request, Response } from "express";
import type { AppServices } from "../app";
import { errorFields } from "../config/logger";
import { idParam, sendError } from "./http-errors";
import { answerSchema, appendTurnSchema } from "./schemas";

/**
 * Chat ledger routes, mounted under /interviews/:id
 */
export function createSessionRoutes({ ledger, logger }: AppServices): Router {
    const router = Router({ mergeParams: true });

    router.post('/session', async (req: Request, res: Response) => {
        try {
            const session = await ledger.openSession(idParam.parse(req.params.id));
            res.status(201).json(session);
        } catch (error) {
            sendError(res, error, logger, 'Open chat session');
        }
    });

    /**
     * POST /interviews/:id/turns
     *
     * Body: { question: string }
     * Returns: { turnId }
     */
    router.post('/turns', async (req: Request, res: Response) => {
        try {
            const interviewId = idParam.parse(req.params.id);
            const { question } = appendTurnSchema.parse(req.body);
            const turnId = await ledger.appendTurn(interviewId, question);
            res.status(201).json({ turnId });
        } catch (error) {
            sendError(res, error, logger, 'Append chat turn');
        }
    });

    router.get('/turns', async (req: Request, res: Response) => {
        try {
            res.json(await ledger.listTurns(idParam.parse(req.params.id)));
        } catch (error) {
            sendError(res, error, logger, 'List chat turns');
        }
    });

    return router;
}

export function createTurnRoutes({ ledger, evaluationQueue, logger }: AppServices): Router {
    const router = Router();

    /**
     * POST /turns/:id/answer
     *
     * Body: { answer: string, score: integer 0..5 }
     * Records the answer, then queues the turn for judging. A queue failure
     * does not undo the answer; the response says whether judging was queued.
     */
    router.post('/:id/answer', async (req: Request, res: Response) => {
        try {
            const turnId = idParam.parse(req.params.id);
            const { answer, score } = answerSchema.parse(req.body);
            const turn = await ledger.recordAnswer(turnId, answer, score);

            let evaluationQueued = true;
            try {
                await evaluationQueue.enqueueEvaluation({ interviewId: turn.interviewId, turnId });
            } catch (error) {
                evaluationQueued = false;
                logger.error({ turnId, interviewId: turn.interviewId, ...errorFields(error) }, 'Failed to add evaluation job to queue');
            }

            res.json({ turn, evaluationQueued });
        } catch (error) {
            sendError(res, error, logger, 'Record answer');
        }
    });

    return router;
}
