/**
 * Lifecycle notifications
 *
 * Handed to the Notification Dispatcher after the transition that produced
 * them has committed. Delivery (email, calendar, chat) is somebody else's job.
 */
import type { ApplicationStatus } from './application';
import type { InterviewType } from './interview';

interface InterviewNotificationBase {
    interviewId: number;
    applicationId: number;
    candidateId: string;
    jobId: string;
}

export type LifecycleNotification =
    | (InterviewNotificationBase & {
        type: 'INTERVIEW_INVITATION';
        interviewType: InterviewType;
        scheduledAt: Date | null;
        joinToken: string;
        tokenExpiry: Date;
    })
    | (InterviewNotificationBase & {
        type: 'INTERVIEW_RESCHEDULED';
        scheduledAt: Date | null;
        joinToken: string;
        tokenExpiry: Date;
    })
    | (InterviewNotificationBase & { type: 'INTERVIEW_CANCELLED'; reason: string | null })
    | (InterviewNotificationBase & { type: 'INTERVIEW_COMPLETED' })
    | {
        type: 'APPLICATION_DECIDED';
        applicationId: number;
        candidateId: string;
        jobId: string;
        status: ApplicationStatus;
        decidedBy: string;
    };

export type LifecycleNotificationType = LifecycleNotification['type'];
