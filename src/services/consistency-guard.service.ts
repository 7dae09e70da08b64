import { logger, type ILogger } from '../config/logger';
import { TypeOrmEngineStore } from '../db/typeorm-engine-store';
import type { IEngineStore } from '../db/interfaces';
import type { Actor, CompletionDetails, InterviewStatus } from '../types/interview';
import type { AggregationOutcome } from '../types/result';
import { KeyedMutex } from '../utils/keyed-mutex';
import type { IAggregator } from './aggregator.service';
import type { ILifecycleCoordinator } from './lifecycle-coordinator.service';

export interface CompletionOutcome {
    outcome: AggregationOutcome;
    status: InterviewStatus;
}

export interface IConsistencyGuard {
    aggregate(interviewId: number): Promise<AggregationOutcome>;
    aggregateAndComplete(interviewId: number, completion?: CompletionDetails, actor?: Actor): Promise<CompletionOutcome>;
}

/**
 * Consistency Guard
 *
 * Serializes everything that writes an interview's result. Within this
 * process a keyed mutex queues callers per interview; across processes the
 * interview row lock taken by the aggregator does the same.
 */
export class ConsistencyGuardService implements IConsistencyGuard {
    private readonly mutex = new KeyedMutex<number>();

    constructor(
        private store: IEngineStore,
        private aggregator: IAggregator,
        private coordinator: ILifecycleCoordinator,
        private logger: ILogger
    ) { }

    /**
     * Factory method for production use
     */
    static create(aggregator: IAggregator, coordinator: ILifecycleCoordinator): ConsistencyGuardService {
        return new ConsistencyGuardService(TypeOrmEngineStore.create(), aggregator, coordinator, logger);
    }

    aggregate(interviewId: number): Promise<AggregationOutcome> {
        return this.mutex.runExclusive(interviewId, async () => {
            const prepared = await this.aggregator.prepareNarrative(interviewId);
            return this.store.transaction((scope) => this.aggregator.aggregateWithin(scope, interviewId, prepared));
        });
    }

    /**
     * Aggregate and complete in one transaction. When the outcome does not
     * allow completion the COMPLETE transition throws IllegalTransition and
     * the aggregation is rolled back with it.
     */
    async aggregateAndComplete(
        interviewId: number,
        completion: CompletionDetails = {},
        actor?: Actor
    ): Promise<CompletionOutcome> {
        const completed = await this.mutex.runExclusive(interviewId, async () => {
            const prepared = await this.aggregator.prepareNarrative(interviewId);
            return this.store.transaction(async (scope) => {
                const outcome = await this.aggregator.aggregateWithin(scope, interviewId, prepared);
                const interview = await this.coordinator.transitionInterviewWithin(
                    scope,
                    interviewId,
                    { type: 'COMPLETE', ...completion },
                    actor
                );
                return { outcome, status: interview.status };
            });
        });

        this.logger.info({ interviewId, outcome: completed.outcome.kind }, 'Interview aggregated and completed');
        return completed;
    }
}
