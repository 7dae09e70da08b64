import { IllegalTransitionError } from '../errors/engine-errors';
import type { InterviewEventType, InterviewStatus } from '../types/interview';

export const TERMINAL_INTERVIEW_STATUSES: readonly InterviewStatus[] = ['COMPLETED', 'CANCELLED', 'NO_SHOW'];

const NON_TERMINAL: InterviewStatus[] = [
    'NOT_SCHEDULED',
    'SCHEDULED',
    'INVITED',
    'CONFIRMED',
    'JOINED',
    'IN_PROGRESS',
    'RESCHEDULED'
];

const AWAITING_CANDIDATE: InterviewStatus[] = ['SCHEDULED', 'INVITED', 'CONFIRMED', 'RESCHEDULED'];

const interviewTransitions: Record<InterviewEventType, { from: InterviewStatus[]; to: InterviewStatus }> = {
    SCHEDULE: { from: ['NOT_SCHEDULED'], to: 'SCHEDULED' },
    INVITE: { from: ['NOT_SCHEDULED'], to: 'INVITED' },
    CONFIRM: { from: ['SCHEDULED', 'INVITED', 'RESCHEDULED'], to: 'CONFIRMED' },
    JOIN: { from: AWAITING_CANDIDATE, to: 'JOINED' },
    START: { from: ['JOINED'], to: 'IN_PROGRESS' },
    COMPLETE: { from: ['IN_PROGRESS'], to: 'COMPLETED' },
    RESCHEDULE: { from: NON_TERMINAL, to: 'RESCHEDULED' },
    CANCEL: { from: NON_TERMINAL, to: 'CANCELLED' },
    MARK_NO_SHOW: { from: AWAITING_CANDIDATE, to: 'NO_SHOW' }
};

export function isTerminalInterviewStatus(status: InterviewStatus): boolean {
    return TERMINAL_INTERVIEW_STATUSES.includes(status);
}

export function isAllowedInterviewTransition(from: InterviewStatus, event: InterviewEventType): boolean {
    return interviewTransitions[event].from.includes(from);
}

/**
 * Target status of `event` from `from`, or IllegalTransitionError.
 */
export function nextInterviewStatus(from: InterviewStatus, event: InterviewEventType): InterviewStatus {
    if (!isAllowedInterviewTransition(from, event)) {
        throw new IllegalTransitionError('Interview', from, event);
    }
    return interviewTransitions[event].to;
}
