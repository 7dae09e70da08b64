import { DEFAULT_SCORING, getConfig, type ScoringConfig } from '../config/env';
import { errorFields, logger, type ILogger } from '../config/logger';
import { TypeOrmEngineStore } from '../db/typeorm-engine-store';
import type { IEngineStore, IStoreScope } from '../db/interfaces';
import { InconsistentError, NotFoundError } from '../errors/engine-errors';
import type { AggregationOutcomeKind } from '../types/interview';
import type {
    AggregationOutcome,
    AggregationStatistics,
    InterviewResultRecord,
    Narrative
} from '../types/result';
import { withTimeout } from '../utils/timeout.util';
import { computeStatistics, statisticsEqual } from './scoring';

export interface INarrativeGenerator {
    summarize(statistics: AggregationStatistics): Promise<Narrative>;
}

// Narrative written ahead of the locked write, for the statistics it was written from
export interface PreparedNarrative {
    statistics: AggregationStatistics;
    narrative: Narrative;
}

export interface IAggregator {
    aggregate(interviewId: number): Promise<AggregationOutcome>;
    prepareNarrative(interviewId: number): Promise<PreparedNarrative | null>;
    aggregateWithin(
        scope: IStoreScope,
        interviewId: number,
        prepared?: PreparedNarrative | null
    ): Promise<AggregationOutcome>;
    latestOutcome(interviewId: number): Promise<AggregationOutcomeKind | null>;
    getResult(interviewId: number): Promise<InterviewResultRecord>;
}

export const EMPTY_NARRATIVE: Narrative = { summaryResult: '', recommendations: null };

const DEFAULT_NARRATIVE_TIMEOUT_MS = 15000;

/**
 * Aggregator
 *
 * Folds the evaluations of an interview into its single Interview Result.
 * Everything is computed first and the row is replaced in one write, in the
 * same transaction that records the outcome on the interview. The interview
 * row lock serializes aggregations of one interview across processes.
 *
 * The narrative is generated before that transaction, from an unlocked read,
 * and used only if the locked read yields the same statistics; otherwise it
 * is generated again under the lock.
 */
export class AggregatorService implements IAggregator {
    constructor(
        private store: IEngineStore,
        private logger: ILogger,
        private scoring: ScoringConfig = DEFAULT_SCORING,
        private narrator: INarrativeGenerator | null = null,
        private narrativeTimeoutMs: number = DEFAULT_NARRATIVE_TIMEOUT_MS
    ) { }

    /**
     * Factory method for production use
     */
    static create(narrator: INarrativeGenerator | null = null): AggregatorService {
        const config = getConfig();
        return new AggregatorService(
            TypeOrmEngineStore.create(),
            logger,
            config.scoring,
            narrator,
            config.narrativeTimeoutMs
        );
    }

    async aggregate(interviewId: number): Promise<AggregationOutcome> {
        const prepared = await this.prepareNarrative(interviewId);
        return this.store.transaction((scope) => this.aggregateWithin(scope, interviewId, prepared));
    }

    /**
     * Narrative for the statistics the interview would aggregate to now, or
     * null when there is nothing to write or no generator. Holds no lock
     * while the generator runs.
     */
    async prepareNarrative(interviewId: number): Promise<PreparedNarrative | null> {
        if (!this.narrator) {
            return null;
        }

        const statistics = await this.store.transaction(async (scope) => {
            const interview = await scope.findInterview(interviewId);
            if (!interview) {
                throw new NotFoundError('Interview', interviewId);
            }
            const evaluations = await scope.listEvaluations(interviewId);
            const turns = await scope.listTurns(interviewId);
            const computed = computeStatistics(evaluations, turns.length, this.scoring);
            if (!computed) {
                return null;
            }
            const existing = await scope.findResult(interviewId);
            return existing && statisticsEqual(existing, computed) ? null : computed;
        });

        if (!statistics) {
            return null;
        }
        return { statistics, narrative: await this.narrate(interviewId, statistics) };
    }

    async aggregateWithin(
        scope: IStoreScope,
        interviewId: number,
        prepared: PreparedNarrative | null = null
    ): Promise<AggregationOutcome> {
        const interview = await scope.findInterview(interviewId, { lock: true });
        if (!interview) {
            throw new NotFoundError('Interview', interviewId);
        }

        const evaluations = await scope.listEvaluations(interviewId);
        const turns = await scope.listTurns(interviewId);
        const totalQuestions = turns.length;

        const statistics = computeStatistics(evaluations, totalQuestions, this.scoring);

        if (!statistics) {
            const outcome: AggregationOutcome = totalQuestions === 0
                ? { kind: 'NO_QUESTIONS' }
                : { kind: 'NOTHING_TO_AGGREGATE', totalQuestions };

            if (interview.aggregationOutcome !== outcome.kind) {
                interview.aggregationOutcome = outcome.kind;
                await scope.saveInterview(interview);
            }

            this.logger.info({ interviewId, outcome: outcome.kind, totalQuestions }, 'Nothing to aggregate');
            return outcome;
        }

        if (statistics.evaluatedCount > totalQuestions) {
            throw new InconsistentError(
                `Interview ${interviewId} has ${statistics.evaluatedCount} scored evaluations for ${totalQuestions} questions`,
                { interviewId, evaluatedCount: statistics.evaluatedCount, totalQuestions }
            );
        }

        const claimed = await scope.findResultByApplication(interview.applicationId);
        if (claimed && claimed.interviewId !== interviewId) {
            throw new InconsistentError(
                `Application ${interview.applicationId} already has a result from interview ${claimed.interviewId}`,
                { interviewId, applicationId: interview.applicationId }
            );
        }

        const existing = await scope.findResult(interviewId);
        let result: InterviewResultRecord;

        if (existing && statisticsEqual(existing, statistics)) {
            // Unchanged inputs: keep the stored row (and its narrative) as it is
            result = existing;
        } else {
            const narrative = prepared && statisticsEqual(prepared.statistics, statistics)
                ? prepared.narrative
                : await this.narrate(interviewId, statistics);
            result = await scope.replaceResult({
                interviewId,
                candidateId: interview.candidateId,
                applicationId: interview.applicationId,
                jobId: interview.jobId,
                ...statistics,
                ...narrative
            });
        }

        if (interview.aggregationOutcome !== 'AGGREGATED') {
            interview.aggregationOutcome = 'AGGREGATED';
            await scope.saveInterview(interview);
        }

        this.logger.info({
            interviewId,
            evaluatedCount: result.evaluatedCount,
            totalQuestions: result.totalQuestions,
            averageScore: result.averageScore,
            passStatus: result.passStatus,
            knowledgeLevel: result.knowledgeLevel,
            rewritten: result !== existing
        }, 'Interview aggregated');

        return { kind: 'AGGREGATED', result };
    }

    async latestOutcome(interviewId: number): Promise<AggregationOutcomeKind | null> {
        const interview = await this.store.transaction((scope) => scope.findInterview(interviewId));
        if (!interview) {
            throw new NotFoundError('Interview', interviewId);
        }
        return interview.aggregationOutcome;
    }

    async getResult(interviewId: number): Promise<InterviewResultRecord> {
        const result = await this.store.transaction((scope) => scope.findResult(interviewId));
        if (!result) {
            throw new NotFoundError('InterviewResult', interviewId);
        }
        return result;
    }

    /**
     * The narrative is optional: a missing generator, an error or a timeout
     * all yield the empty narrative.
     */
    private async narrate(interviewId: number, statistics: AggregationStatistics): Promise<Narrative> {
        if (!this.narrator) {
            return EMPTY_NARRATIVE;
        }
        try {
            return await withTimeout(
                this.narrator.summarize(statistics),
                this.narrativeTimeoutMs,
                'Narrative generation'
            );
        } catch (error) {
            this.logger.warn({ interviewId, ...errorFields(error) }, 'Narrative generation failed, storing empty narrative');
            return EMPTY_NARRATIVE;
        }
    }
}
