import { IllegalTransitionError } from '../errors/engine-errors';
import type { ApplicationEventType, ApplicationStatus } from '../types/application';

export const TERMINAL_APPLICATION_STATUSES: readonly ApplicationStatus[] = ['HIRED', 'REJECTED'];

const applicationTransitions: Record<ApplicationEventType, { from: ApplicationStatus[]; to: ApplicationStatus }> = {
    INVITE: { from: ['NEW'], to: 'INVITED' },
    APPLY: { from: ['NEW', 'INVITED'], to: 'APPLIED' },
    SCREEN: { from: ['INVITED', 'APPLIED'], to: 'SCREENING' },
    START_INTERVIEW: { from: ['NEW', 'INVITED', 'APPLIED', 'SCREENING'], to: 'INTERVIEW' },
    OFFER: { from: ['INTERVIEW'], to: 'OFFER' },
    HIRE: { from: ['OFFER'], to: 'HIRED' },
    REJECT: { from: ['NEW', 'INVITED', 'APPLIED', 'SCREENING', 'INTERVIEW', 'OFFER'], to: 'REJECTED' }
};

// A decision taken from these statuses needs a stored interview result
const RESULT_GATED: ApplicationStatus[] = ['INTERVIEW', 'OFFER'];

export function isAllowedApplicationTransition(from: ApplicationStatus, event: ApplicationEventType): boolean {
    return applicationTransitions[event].from.includes(from);
}

export function requiresInterviewResult(from: ApplicationStatus, event: ApplicationEventType): boolean {
    if (event === 'OFFER' || event === 'HIRE') {
        return true;
    }
    return event === 'REJECT' && RESULT_GATED.includes(from);
}

export function nextApplicationStatus(from: ApplicationStatus, event: ApplicationEventType): ApplicationStatus {
    if (!isAllowedApplicationTransition(from, event)) {
        throw new IllegalTransitionError('Application', from, event);
    }
    return applicationTransitions[event].to;
}
