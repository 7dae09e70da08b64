/**
 * Interview lifecycle types
 */

export const INTERVIEW_STATUSES = [
    'NOT_SCHEDULED',
    'SCHEDULED',
    'INVITED',
    'CONFIRMED',
    'JOINED',
    'IN_PROGRESS',
    'COMPLETED',
    'RESCHEDULED',
    'CANCELLED',
    'NO_SHOW'
] as const;

export type InterviewStatus = typeof INTERVIEW_STATUSES[number];

export const INTERVIEW_TYPES = ['PHONE', 'VIDEO', 'IN_PERSON', 'TECHNICAL', 'BEHAVIORAL', 'PANEL'] as const;

export type InterviewType = typeof INTERVIEW_TYPES[number];

// Last outcome recorded by the Aggregator for an interview
export type AggregationOutcomeKind = 'AGGREGATED' | 'NO_QUESTIONS' | 'NOTHING_TO_AGGREGATE';

export interface InterviewRecord {
    id: number;
    candidateId: string;
    applicationId: number;
    jobId: string;
    scheduledById: string;
    type: InterviewType;
    status: InterviewStatus;
    scheduledAt: Date | null;
    duration: number | null;
    timezone: string | null;
    joinToken: string | null;
    tokenExpiry: Date | null;
    tokenConsumedAt: Date | null;
    aggregationOutcome: AggregationOutcomeKind | null;
    feedback: string | null;
    rating: number | null;
    cancelReason: string | null;
    startedAt: Date | null;
    completedAt: Date | null;
    createdAt: Date;
    updatedAt: Date;
}

export type NewInterview = Pick<InterviewRecord, 'candidateId' | 'applicationId' | 'jobId' | 'scheduledById' | 'type'>;

export interface ScheduleDetails {
    scheduledAt: Date;
    duration?: number;
    timezone?: string;
}

export interface CompletionDetails {
    feedback?: string;
    rating?: number;
}

/**
 * Events accepted by the interview state machine. JOIN is not listed here:
 * it is driven by token validation through LifecycleCoordinator.joinInterview.
 */
export type InterviewEvent =
    | ({ type: 'SCHEDULE' } & ScheduleDetails)
    | { type: 'INVITE' }
    | { type: 'CONFIRM' }
    | { type: 'START' }
    | ({ type: 'COMPLETE' } & CompletionDetails)
    | ({ type: 'RESCHEDULE' } & ScheduleDetails)
    | { type: 'CANCEL'; reason?: string }
    | { type: 'MARK_NO_SHOW' };

export type InterviewEventType = InterviewEvent['type'] | 'JOIN';

export interface ChatSessionRecord {
    interviewId: number;
    lastLevel: number;
    openedAt: Date;
}

export interface ChatTurnRecord {
    id: number;
    interviewId: number;
    question: string;
    answer: string | null;
    score: number | null;
    level: number;
    askedAt: Date;
    answeredAt: Date | null;
}

export type NewChatTurn = Pick<ChatTurnRecord, 'interviewId' | 'question' | 'level'>;

// Already-authorized identity supplied by the access layer
export interface Actor {
    id: string;
    role?: string;
}
