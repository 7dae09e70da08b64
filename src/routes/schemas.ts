import { z } from "zod";
import { INTERVIEW_TYPES } from "../types/interview";

export const actorSchema = z.object({
    id: z.string().min(1),
    role: z.string().optional()
}).optional();

const scheduleFields = {
    scheduledAt: z.coerce.date(),
    duration: z.number().int().positive().optional(),
    timezone: z.string().min(1).optional()
};

export const interviewEventSchema = z.discriminatedUnion('type', [
    z.object({ type: z.literal('SCHEDULE'), ...scheduleFields }),
    z.object({ type: z.literal('INVITE') }),
    z.object({ type: z.literal('CONFIRM') }),
    z.object({ type: z.literal('START') }),
    z.object({
        type: z.literal('COMPLETE'),
        feedback: z.string().optional(),
        rating: z.number().optional()
    }),
    z.object({ type: z.literal('RESCHEDULE'), ...scheduleFields }),
    z.object({ type: z.literal('CANCEL'), reason: z.string().optional() }),
    z.object({ type: z.literal('MARK_NO_SHOW') })
]);

export const applicationEventSchema = z.discriminatedUnion('type', [
    z.object({ type: z.literal('INVITE') }),
    z.object({ type: z.literal('APPLY') }),
    z.object({ type: z.literal('SCREEN') }),
    z.object({ type: z.literal('START_INTERVIEW') }),
    z.object({ type: z.literal('OFFER'), decidedBy: z.string().min(1) }),
    z.object({ type: z.literal('HIRE'), decidedBy: z.string().min(1) }),
    z.object({ type: z.literal('REJECT'), decidedBy: z.string().min(1), reason: z.string().optional() })
]);

export const createApplicationSchema = z.object({
    jobId: z.string().min(1, "Job ID is required"),
    candidateId: z.string().min(1, "Candidate ID is required")
});

export const createInterviewSchema = z.object({
    applicationId: z.number().int().positive("Application ID must be a positive integer"),
    scheduledById: z.string().min(1, "Scheduling user is required"),
    type: z.enum(INTERVIEW_TYPES)
});

export const completionSchema = z.object({
    feedback: z.string().optional(),
    rating: z.number().optional(),
    actor: actorSchema
});

export const joinSchema = z.object({
    token: z.string().min(1)
});

export const appendTurnSchema = z.object({
    question: z.string().min(1, "Question is required")
});

export const answerSchema = z.object({
    answer: z.string().min(1, "Answer is required"),
    score: z.number()
});
