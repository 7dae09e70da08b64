import { getConfig } from '../config/env';
import { errorFields, logger, type ILogger } from '../config/logger';
import { TypeOrmEngineStore } from '../db/typeorm-engine-store';
import type { IEngineStore, IStoreScope } from '../db/interfaces';
import {
    ConsumedTokenError,
    ExpiredTokenError,
    IllegalTransitionError,
    InvalidScoreError,
    InvalidTokenError,
    NotFoundError
} from '../errors/engine-errors';
import {
    isAllowedApplicationTransition,
    nextApplicationStatus,
    requiresInterviewResult
} from '../state/application-transitions';
import { nextInterviewStatus } from '../state/interview-transitions';
import type { ApplicationEvent, ApplicationRecord, ApplicationStatus } from '../types/application';
import type {
    Actor,
    InterviewEvent,
    InterviewRecord,
    InterviewStatus,
    InterviewType,
    ScheduleDetails
} from '../types/interview';
import type { LifecycleNotification } from '../types/notification';
import { systemClock, type Clock } from '../utils/clock';
import {
    generateJoinToken,
    isTokenExpired,
    isWellFormedToken,
    tokenExpiryFrom,
    tokensMatch
} from '../utils/join-token.util';

export interface INotificationDispatcher {
    notify(notification: LifecycleNotification): Promise<void>;
}

export interface ILifecycleCoordinator {
    createApplication(jobId: string, candidateId: string): Promise<ApplicationRecord>;
    getApplication(applicationId: number): Promise<ApplicationRecord>;
    createInterview(applicationId: number, scheduledById: string, type: InterviewType): Promise<InterviewRecord>;
    getInterview(interviewId: number): Promise<InterviewRecord>;
    deleteInterview(interviewId: number): Promise<void>;
    transitionInterview(interviewId: number, event: InterviewEvent, actor?: Actor): Promise<InterviewStatus>;
    transitionInterviewWithin(
        scope: IStoreScope,
        interviewId: number,
        event: InterviewEvent,
        actor?: Actor
    ): Promise<InterviewRecord>;
    joinInterview(interviewId: number, token: string): Promise<InterviewStatus>;
    transitionApplication(applicationId: number, event: ApplicationEvent, actor?: Actor): Promise<ApplicationStatus>;
}

export const MIN_RATING = 1;
export const MAX_RATING = 5;

const DEFAULT_JOIN_TOKEN_TTL_HOURS = 48;

/**
 * Lifecycle Coordinator
 *
 * Drives the Interview and Application state machines. Every transition
 * reads the row under lock, checks the transition table, writes and queues
 * its notification for after the commit, all inside one transaction.
 */
export class LifecycleCoordinatorService implements ILifecycleCoordinator {
    constructor(
        private store: IEngineStore,
        private logger: ILogger,
        private notifier: INotificationDispatcher | null = null,
        private joinTokenTtlHours: number = DEFAULT_JOIN_TOKEN_TTL_HOURS,
        private clock: Clock = systemClock
    ) { }

    /**
     * Factory method for production use
     */
    static create(notifier: INotificationDispatcher | null = null): LifecycleCoordinatorService {
        return new LifecycleCoordinatorService(
            TypeOrmEngineStore.create(),
            logger,
            notifier,
            getConfig().joinTokenTtlHours
        );
    }

    /**
     * Returns the existing application when the (job, candidate) pair is taken.
     */
    async createApplication(jobId: string, candidateId: string): Promise<ApplicationRecord> {
        return this.store.transaction(async (scope) => {
            const existing = await scope.findApplicationByPair(jobId, candidateId);
            if (existing) {
                return existing;
            }
            const application = await scope.insertApplication({ jobId, candidateId });
            this.logger.info({ applicationId: application.id, jobId, candidateId }, 'Application created');
            return application;
        });
    }

    async getApplication(applicationId: number): Promise<ApplicationRecord> {
        const application = await this.store.transaction((scope) => scope.findApplication(applicationId));
        if (!application) {
            throw new NotFoundError('Application', applicationId);
        }
        return application;
    }

    async createInterview(applicationId: number, scheduledById: string, type: InterviewType): Promise<InterviewRecord> {
        return this.store.transaction(async (scope) => {
            const application = await scope.findApplication(applicationId);
            if (!application) {
                throw new NotFoundError('Application', applicationId);
            }
            const interview = await scope.insertInterview({
                candidateId: application.candidateId,
                applicationId,
                jobId: application.jobId,
                scheduledById,
                type
            });
            this.logger.info({ interviewId: interview.id, applicationId, type }, 'Interview created');
            return interview;
        });
    }

    async getInterview(interviewId: number): Promise<InterviewRecord> {
        const interview = await this.store.transaction((scope) => scope.findInterview(interviewId));
        if (!interview) {
            throw new NotFoundError('Interview', interviewId);
        }
        return interview;
    }

    async deleteInterview(interviewId: number): Promise<void> {
        await this.store.transaction(async (scope) => {
            const interview = await scope.findInterview(interviewId, { lock: true });
            if (!interview) {
                throw new NotFoundError('Interview', interviewId);
            }
            await scope.deleteInterview(interviewId);
        });
        this.logger.info({ interviewId }, 'Interview deleted');
    }

    async transitionInterview(interviewId: number, event: InterviewEvent, actor?: Actor): Promise<InterviewStatus> {
        const interview = await this.store.transaction((scope) =>
            this.transitionInterviewWithin(scope, interviewId, event, actor)
        );
        return interview.status;
    }

    async transitionInterviewWithin(
        scope: IStoreScope,
        interviewId: number,
        event: InterviewEvent,
        actor?: Actor
    ): Promise<InterviewRecord> {
        const interview = await scope.findInterview(interviewId, { lock: true });
        if (!interview) {
            throw new NotFoundError('Interview', interviewId);
        }

        const from = interview.status;
        const to = nextInterviewStatus(from, event.type);
        const now = this.clock();

        switch (event.type) {
            case 'SCHEDULE':
            case 'RESCHEDULE':
                this.applySchedule(interview, event);
                this.issueJoinToken(interview, now);
                break;
            case 'INVITE':
                this.issueJoinToken(interview, now);
                break;
            case 'START':
                interview.startedAt = now;
                break;
            case 'COMPLETE':
                // Completion needs a recorded result or the zero-questions sentinel
                if (interview.aggregationOutcome !== 'AGGREGATED' && interview.aggregationOutcome !== 'NO_QUESTIONS') {
                    throw new IllegalTransitionError(
                        'Interview',
                        from,
                        event.type,
                        `aggregation outcome is ${interview.aggregationOutcome ?? 'missing'}`
                    );
                }
                if (event.rating !== undefined) {
                    if (!Number.isInteger(event.rating) || event.rating < MIN_RATING || event.rating > MAX_RATING) {
                        throw new InvalidScoreError('rating', event.rating, `an integer in ${MIN_RATING}..${MAX_RATING}`);
                    }
                    interview.rating = event.rating;
                }
                if (event.feedback !== undefined) {
                    interview.feedback = event.feedback;
                }
                interview.completedAt = now;
                break;
            case 'CANCEL':
                interview.cancelReason = event.reason ?? null;
                break;
            case 'CONFIRM':
            case 'MARK_NO_SHOW':
                break;
        }

        interview.status = to;
        const saved = await scope.saveInterview(interview);

        // Leaving NOT_SCHEDULED or starting moves the application into INTERVIEW
        if (event.type === 'SCHEDULE' || event.type === 'INVITE' || to === 'IN_PROGRESS') {
            await this.advanceApplication(scope, saved.applicationId);
        }

        const notification = this.interviewNotification(saved, event);
        if (notification) {
            this.notifyAfterCommit(scope, notification);
        }

        this.logger.info({
            interviewId,
            event: event.type,
            from,
            to,
            actorId: actor?.id,
            actorRole: actor?.role
        }, 'Interview transitioned');

        return saved;
    }

    /**
     * Candidate-facing join. Token checks and consumption share the
     * transaction of the status change; any failure leaves the row as it was.
     */
    async joinInterview(interviewId: number, token: string): Promise<InterviewStatus> {
        const interview = await this.store.transaction(async (scope) => {
            const existing = await scope.findInterview(interviewId, { lock: true });
            if (!existing) {
                throw new NotFoundError('Interview', interviewId);
            }
            if (!isWellFormedToken(token) || !existing.joinToken || !tokensMatch(existing.joinToken, token)) {
                throw new InvalidTokenError('Join token does not match', { interviewId });
            }
            if (existing.tokenConsumedAt) {
                throw new ConsumedTokenError('Join token already used', { interviewId });
            }

            const now = this.clock();
            if (isTokenExpired(existing.tokenExpiry, now)) {
                throw new ExpiredTokenError('Join token expired', { interviewId });
            }

            const from = existing.status;
            existing.status = nextInterviewStatus(from, 'JOIN');
            existing.tokenConsumedAt = now;
            return scope.saveInterview(existing);
        });

        this.logger.info({ interviewId, status: interview.status }, 'Candidate joined interview');
        return interview.status;
    }

    async transitionApplication(applicationId: number, event: ApplicationEvent, actor?: Actor): Promise<ApplicationStatus> {
        const application = await this.store.transaction(async (scope) => {
            const existing = await scope.findApplication(applicationId, { lock: true });
            if (!existing) {
                throw new NotFoundError('Application', applicationId);
            }

            const from = existing.status;
            const to = nextApplicationStatus(from, event.type);

            if (requiresInterviewResult(from, event.type)) {
                const result = await scope.findResultByApplication(applicationId);
                if (!result) {
                    throw new IllegalTransitionError('Application', from, event.type, 'no interview result');
                }
            }

            existing.status = to;
            const saved = await scope.saveApplication(existing);

            if (event.type === 'OFFER' || event.type === 'HIRE' || event.type === 'REJECT') {
                this.notifyAfterCommit(scope, {
                    type: 'APPLICATION_DECIDED',
                    applicationId,
                    candidateId: saved.candidateId,
                    jobId: saved.jobId,
                    status: to,
                    decidedBy: event.decidedBy
                });
            }

            this.logger.info({
                applicationId,
                event: event.type,
                from,
                to,
                actorId: actor?.id,
                actorRole: actor?.role
            }, 'Application transitioned');

            return saved;
        });

        return application.status;
    }

    private applySchedule(interview: InterviewRecord, details: ScheduleDetails): void {
        interview.scheduledAt = details.scheduledAt;
        if (details.duration !== undefined) {
            interview.duration = details.duration;
        }
        if (details.timezone !== undefined) {
            interview.timezone = details.timezone;
        }
    }

    private issueJoinToken(interview: InterviewRecord, now: Date): void {
        interview.joinToken = generateJoinToken();
        interview.tokenExpiry = tokenExpiryFrom(now, this.joinTokenTtlHours);
        interview.tokenConsumedAt = null;
    }

    private async advanceApplication(scope: IStoreScope, applicationId: number): Promise<void> {
        const application = await scope.findApplication(applicationId, { lock: true });
        if (!application || !isAllowedApplicationTransition(application.status, 'START_INTERVIEW')) {
            return;
        }
        const from = application.status;
        application.status = 'INTERVIEW';
        await scope.saveApplication(application);
        this.logger.info({ applicationId, from, to: 'INTERVIEW' }, 'Application moved to interview');
    }

    private interviewNotification(interview: InterviewRecord, event: InterviewEvent): LifecycleNotification | null {
        const base = {
            interviewId: interview.id,
            applicationId: interview.applicationId,
            candidateId: interview.candidateId,
            jobId: interview.jobId
        };

        switch (event.type) {
            case 'SCHEDULE':
            case 'INVITE':
            case 'RESCHEDULE':
                if (!interview.joinToken || !interview.tokenExpiry) {
                    return null;
                }
                return event.type === 'RESCHEDULE'
                    ? {
                        ...base,
                        type: 'INTERVIEW_RESCHEDULED',
                        scheduledAt: interview.scheduledAt,
                        joinToken: interview.joinToken,
                        tokenExpiry: interview.tokenExpiry
                    }
                    : {
                        ...base,
                        type: 'INTERVIEW_INVITATION',
                        interviewType: interview.type,
                        scheduledAt: interview.scheduledAt,
                        joinToken: interview.joinToken,
                        tokenExpiry: interview.tokenExpiry
                    };
            case 'CANCEL':
                return { ...base, type: 'INTERVIEW_CANCELLED', reason: interview.cancelReason };
            case 'COMPLETE':
                return { ...base, type: 'INTERVIEW_COMPLETED' };
            default:
                return null;
        }
    }

    // Fire and forget: a failed dispatch is logged and never undoes the transition
    private notifyAfterCommit(scope: IStoreScope, notification: LifecycleNotification): void {
        const notifier = this.notifier;
        if (!notifier) {
            return;
        }
        scope.afterCommit(() => {
            void notifier.notify(notification).catch((error: unknown) => {
                this.logger.warn({ type: notification.type, ...errorFields(error) }, 'Notification dispatch failed');
            });
        });
    }
}
