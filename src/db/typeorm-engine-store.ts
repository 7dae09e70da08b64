import { QueryFailedError, type EntityManager, type FindOneOptions } from "typeorm";
import { AppDataSource } from "./data-source";
import { Application } from "./entities/application.entity";
import { Interview } from "./entities/interview.entity";
import { ChatSession } from "./entities/chat-session.entity";
import { ChatTurn } from "./entities/chat-turn.entity";
import { Evaluation } from "./entities/evaluation.entity";
import { InterviewResult } from "./entities/interview-result.entity";
import type { FindOptions, IEngineStore, IStoreScope, ResultRow } from "./interfaces";
import { logger, errorFields, type ILogger } from "../config/logger";
import { DuplicateSessionError, InconsistentError } from "../errors/engine-errors";
import type { ApplicationRecord, NewApplication } from "../types/application";
import type { EvaluationRecord, NewEvaluation } from "../types/evaluation";
import type { ChatSessionRecord, ChatTurnRecord, InterviewRecord, NewChatTurn, NewInterview } from "../types/interview";
import type { InterviewResultRecord } from "../types/result";

const UNIQUE_VIOLATION = '23505';

// EntityManager calls the scope makes
export type EngineManager = Pick<
    EntityManager,
    'findOne' | 'find' | 'findOneByOrFail' | 'create' | 'save' | 'insert' | 'upsert' | 'delete'
>;

// The part of a TypeORM QueryRunner a transaction needs
export interface TransactionRunner {
    manager: EngineManager;
    isTransactionActive: boolean;
    connect(): Promise<unknown>;
    startTransaction(): Promise<void>;
    commitTransaction(): Promise<void>;
    rollbackTransaction(): Promise<void>;
    release(): Promise<void>;
}

export interface TransactionSource {
    createQueryRunner(): TransactionRunner;
}

function lockOf<T>(options?: FindOptions): FindOneOptions<T>['lock'] {
    return options?.lock ? { mode: 'pessimistic_write' } : undefined;
}

function isUniqueViolation(error: unknown): boolean {
    if (!(error instanceof QueryFailedError)) {
        return false;
    }
    const driverError: unknown = error.driverError;
    return typeof driverError === 'object'
        && driverError !== null
        && 'code' in driverError
        && driverError.code === UNIQUE_VIOLATION;
}

/**
 * Transaction-bound scope over the engine's tables.
 */
class TypeOrmStoreScope implements IStoreScope {
    constructor(
        private manager: EngineManager,
        private hooks: Array<() => void>
    ) { }

    findInterview(id: number, options?: FindOptions): Promise<InterviewRecord | null> {
        return this.manager.findOne(Interview, { where: { id }, lock: lockOf<Interview>(options) });
    }

    insertInterview(data: NewInterview): Promise<InterviewRecord> {
        return this.manager.save(Interview, this.manager.create(Interview, {
            ...data,
            status: 'NOT_SCHEDULED',
            scheduledAt: null,
            duration: null,
            timezone: null,
            joinToken: null,
            tokenExpiry: null,
            tokenConsumedAt: null,
            aggregationOutcome: null,
            feedback: null,
            rating: null,
            cancelReason: null,
            startedAt: null,
            completedAt: null
        }));
    }

    saveInterview(interview: InterviewRecord): Promise<InterviewRecord> {
        return this.manager.save(Interview, interview);
    }

    async deleteInterview(id: number): Promise<void> {
        // Session, turns, evaluations and result go with it through ON DELETE CASCADE
        await this.manager.delete(Interview, { id });
    }

    findApplication(id: number, options?: FindOptions): Promise<ApplicationRecord | null> {
        return this.manager.findOne(Application, { where: { id }, lock: lockOf<Application>(options) });
    }

    findApplicationByPair(jobId: string, candidateId: string): Promise<ApplicationRecord | null> {
        return this.manager.findOne(Application, { where: { jobId, candidateId } });
    }

    insertApplication(data: NewApplication): Promise<ApplicationRecord> {
        return this.manager.save(Application, this.manager.create(Application, { ...data, status: 'NEW' }));
    }

    saveApplication(application: ApplicationRecord): Promise<ApplicationRecord> {
        return this.manager.save(Application, application);
    }

    findSession(interviewId: number, options?: FindOptions): Promise<ChatSessionRecord | null> {
        return this.manager.findOne(ChatSession, { where: { interviewId }, lock: lockOf<ChatSession>(options) });
    }

    async insertSession(interviewId: number): Promise<ChatSessionRecord> {
        try {
            // Plain INSERT: save() would turn an existing row into an UPDATE
            await this.manager.insert(ChatSession, { interviewId, lastLevel: 0 });
        } catch (error) {
            if (isUniqueViolation(error)) {
                throw new DuplicateSessionError(interviewId);
            }
            throw error;
        }
        return this.manager.findOneByOrFail(ChatSession, { interviewId });
    }

    saveSession(session: ChatSessionRecord): Promise<ChatSessionRecord> {
        return this.manager.save(ChatSession, session);
    }

    insertTurn(turn: NewChatTurn): Promise<ChatTurnRecord> {
        return this.manager.save(ChatTurn, this.manager.create(ChatTurn, {
            ...turn,
            answer: null,
            score: null,
            answeredAt: null
        }));
    }

    findTurn(id: number, options?: FindOptions): Promise<ChatTurnRecord | null> {
        return this.manager.findOne(ChatTurn, { where: { id }, lock: lockOf<ChatTurn>(options) });
    }

    saveTurn(turn: ChatTurnRecord): Promise<ChatTurnRecord> {
        return this.manager.save(ChatTurn, turn);
    }

    listTurns(interviewId: number): Promise<ChatTurnRecord[]> {
        return this.manager.find(ChatTurn, { where: { interviewId }, order: { level: 'ASC' } });
    }

    async insertEvaluation(evaluation: NewEvaluation): Promise<EvaluationRecord> {
        try {
            return await this.manager.save(Evaluation, this.manager.create(Evaluation, evaluation));
        } catch (error) {
            if (isUniqueViolation(error)) {
                throw new InconsistentError(
                    `Chat turn ${evaluation.turnId} already has an evaluation`,
                    { interviewId: evaluation.interviewId, turnId: evaluation.turnId }
                );
            }
            throw error;
        }
    }

    findEvaluationByTurn(turnId: number): Promise<EvaluationRecord | null> {
        return this.manager.findOne(Evaluation, { where: { turnId } });
    }

    listEvaluations(interviewId: number): Promise<EvaluationRecord[]> {
        return this.manager.find(Evaluation, { where: { interviewId }, order: { id: 'ASC' } });
    }

    findResult(interviewId: number): Promise<InterviewResultRecord | null> {
        return this.manager.findOne(InterviewResult, { where: { interviewId } });
    }

    findResultByApplication(applicationId: number): Promise<InterviewResultRecord | null> {
        return this.manager.findOne(InterviewResult, { where: { applicationId } });
    }

    async replaceResult(row: ResultRow): Promise<InterviewResultRecord> {
        try {
            // INSERT ... ON CONFLICT ("interview_id") DO UPDATE: one statement, whole row
            await this.manager.upsert(InterviewResult, { ...row, updatedAt: new Date() }, ['interviewId']);
        } catch (error) {
            // Only UQ_interview_results_application can fire here
            if (isUniqueViolation(error)) {
                throw new InconsistentError(
                    `Application ${row.applicationId} already has a result from another interview`,
                    { interviewId: row.interviewId, applicationId: row.applicationId }
                );
            }
            throw error;
        }
        return this.manager.findOneByOrFail(InterviewResult, { interviewId: row.interviewId });
    }

    afterCommit(hook: () => void): void {
        this.hooks.push(hook);
    }
}

/**
 * TypeORM Engine Store
 *
 * Each transaction gets its own query runner (one pooled connection),
 * committed when the work resolves and rolled back when it throws.
 */
export class TypeOrmEngineStore implements IEngineStore {
    constructor(
        private dataSource: TransactionSource,
        private logger: ILogger
    ) { }

    /**
     * Factory method for production use
     */
    static create(): TypeOrmEngineStore {
        return new TypeOrmEngineStore(AppDataSource, logger);
    }

    async transaction<T>(work: (scope: IStoreScope) => Promise<T>): Promise<T> {
        const queryRunner = this.dataSource.createQueryRunner();
        await queryRunner.connect();
        await queryRunner.startTransaction();

        const hooks: Array<() => void> = [];
        try {
            const result = await work(new TypeOrmStoreScope(queryRunner.manager, hooks));
            await queryRunner.commitTransaction();
            this.runHooks(hooks);
            return result;
        } catch (error) {
            if (queryRunner.isTransactionActive) {
                await queryRunner.rollbackTransaction();
            }
            throw error;
        } finally {
            await queryRunner.release();
        }
    }

    private runHooks(hooks: Array<() => void>): void {
        for (const hook of hooks) {
            try {
                hook();
            } catch (error) {
                this.logger.warn(errorFields(error), 'After-commit hook failed');
            }
        }
    }
}
