/**
 * Database Interfaces
 *
 * Storage contract of the engine. Services never talk to TypeORM directly:
 * they run their reads and writes inside `IEngineStore.transaction` and get
 * an `IStoreScope` bound to that transaction. Production uses the TypeORM
 * implementation; tests use an in-process store with the same semantics.
 */
import type { ApplicationRecord, NewApplication } from '../types/application';
import type { EvaluationRecord, NewEvaluation } from '../types/evaluation';
import type {
    ChatSessionRecord,
    ChatTurnRecord,
    InterviewRecord,
    NewChatTurn,
    NewInterview
} from '../types/interview';
import type { InterviewResultRecord } from '../types/result';

export interface FindOptions {
    /** Take a row lock (`SELECT ... FOR UPDATE`) held until the transaction ends. */
    lock?: boolean;
}

export type ResultRow = Omit<InterviewResultRecord, 'updatedAt'>;

export interface IStoreScope {
    findInterview(id: number, options?: FindOptions): Promise<InterviewRecord | null>;
    insertInterview(data: NewInterview): Promise<InterviewRecord>;
    saveInterview(interview: InterviewRecord): Promise<InterviewRecord>;
    /** Deletes the interview together with its session, turns, evaluations and result. */
    deleteInterview(id: number): Promise<void>;

    findApplication(id: number, options?: FindOptions): Promise<ApplicationRecord | null>;
    findApplicationByPair(jobId: string, candidateId: string): Promise<ApplicationRecord | null>;
    insertApplication(data: NewApplication): Promise<ApplicationRecord>;
    saveApplication(application: ApplicationRecord): Promise<ApplicationRecord>;

    findSession(interviewId: number, options?: FindOptions): Promise<ChatSessionRecord | null>;
    /** Fails with DuplicateSessionError when the interview already owns a session. */
    insertSession(interviewId: number): Promise<ChatSessionRecord>;
    saveSession(session: ChatSessionRecord): Promise<ChatSessionRecord>;

    insertTurn(turn: NewChatTurn): Promise<ChatTurnRecord>;
    findTurn(id: number, options?: FindOptions): Promise<ChatTurnRecord | null>;
    saveTurn(turn: ChatTurnRecord): Promise<ChatTurnRecord>;
    /** Ordered by level. */
    listTurns(interviewId: number): Promise<ChatTurnRecord[]>;

    /** Fails with InconsistentError when the turn already has an evaluation. */
    insertEvaluation(evaluation: NewEvaluation): Promise<EvaluationRecord>;
    findEvaluationByTurn(turnId: number): Promise<EvaluationRecord | null>;
    /** Ordered by creation. */
    listEvaluations(interviewId: number): Promise<EvaluationRecord[]>;

    findResult(interviewId: number): Promise<InterviewResultRecord | null>;
    findResultByApplication(applicationId: number): Promise<InterviewResultRecord | null>;
    /**
     * Inserts or replaces the whole result row of `row.interviewId`. Fails with
     * InconsistentError when another interview holds the application's result.
     */
    replaceResult(row: ResultRow): Promise<InterviewResultRecord>;

    /** Runs after a successful commit; dropped on rollback. */
    afterCommit(hook: () => void): void;
}

export interface IEngineStore {
    /**
     * Run `work` in one transaction. Everything it wrote is committed when it
     * resolves and rolled back when it throws; the error is rethrown as is.
     */
    transaction<T>(work: (scope: IStoreScope) => Promise<T>): Promise<T>;
}
