/**
 * Application lifecycle types
 */

export const APPLICATION_STATUSES = [
    'NEW',
    'INVITED',
    'APPLIED',
    'SCREENING',
    'INTERVIEW',
    'OFFER',
    'HIRED',
    'REJECTED'
] as const;

export type ApplicationStatus = typeof APPLICATION_STATUSES[number];

export interface ApplicationRecord {
    id: number;
    jobId: string;
    candidateId: string;
    status: ApplicationStatus;
    createdAt: Date;
    updatedAt: Date;
}

export type NewApplication = Pick<ApplicationRecord, 'jobId' | 'candidateId'>;

// OFFER, HIRE and REJECT are hiring decisions taken outside the engine
export type ApplicationEvent =
    | { type: 'INVITE' }
    | { type: 'APPLY' }
    | { type: 'SCREEN' }
    | { type: 'START_INTERVIEW' }
    | { type: 'OFFER'; decidedBy: string }
    | { type: 'HIRE'; decidedBy: string }
    | { type: 'REJECT'; decidedBy: string; reason?: string };

export type ApplicationEventType = ApplicationEvent['type'];
