import { logger, type ILogger } from '../config/logger';
import { TypeOrmEngineStore } from '../db/typeorm-engine-store';
import type { IEngineStore } from '../db/interfaces';
import {
    AlreadyAnsweredError,
    InvalidScoreError,
    NotFoundError
} from '../errors/engine-errors';
import type { ChatSessionRecord, ChatTurnRecord } from '../types/interview';
import { systemClock, type Clock } from '../utils/clock';

export const MIN_TURN_SCORE = 0;
export const MAX_TURN_SCORE = 5;

export interface IChatLedger {
    openSession(interviewId: number): Promise<ChatSessionRecord>;
    appendTurn(interviewId: number, question: string): Promise<number>;
    recordAnswer(turnId: number, answer: string, score: number): Promise<ChatTurnRecord>;
    listTurns(interviewId: number): Promise<ChatTurnRecord[]>;
    getTurn(turnId: number): Promise<ChatTurnRecord>;
}

/**
 * Chat Session Ledger
 *
 * One ledger per interview holding the ordered question/answer turns.
 * Levels come from the session's `lastLevel` counter, read and bumped under
 * a row lock, so they follow commit order and never repeat or skip.
 *
 * Asking a question withdraws a NO_QUESTIONS outcome: the interview can no
 * longer complete on it and has to be aggregated again.
 */
export class ChatLedgerService implements IChatLedger {
    constructor(
        private store: IEngineStore,
        private logger: ILogger,
        private clock: Clock = systemClock
    ) { }

    /**
     * Factory method for production use
     */
    static create(): ChatLedgerService {
        return new ChatLedgerService(TypeOrmEngineStore.create(), logger);
    }

    async openSession(interviewId: number): Promise<ChatSessionRecord> {
        const session = await this.store.transaction(async (scope) => {
            const interview = await scope.findInterview(interviewId);
            if (!interview) {
                throw new NotFoundError('Interview', interviewId);
            }
            // Primary key on interview_id rejects a second ledger
            return scope.insertSession(interviewId);
        });

        this.logger.info({ interviewId }, 'Chat session opened');
        return session;
    }

    async appendTurn(interviewId: number, question: string): Promise<number> {
        const turn = await this.store.transaction(async (scope) => {
            // Interview before session, the order every writer takes them in
            const interview = await scope.findInterview(interviewId, { lock: true });
            if (!interview) {
                throw new NotFoundError('Interview', interviewId);
            }
            const session = await scope.findSession(interviewId, { lock: true });
            if (!session) {
                throw new NotFoundError('ChatSession', interviewId);
            }

            if (interview.aggregationOutcome === 'NO_QUESTIONS') {
                interview.aggregationOutcome = null;
                await scope.saveInterview(interview);
            }

            const level = session.lastLevel + 1;
            session.lastLevel = level;
            await scope.saveSession(session);

            return scope.insertTurn({ interviewId, question, level });
        });

        this.logger.info({ interviewId, turnId: turn.id, level: turn.level }, 'Chat turn appended');
        return turn.id;
    }

    async recordAnswer(turnId: number, answer: string, score: number): Promise<ChatTurnRecord> {
        if (!Number.isInteger(score) || score < MIN_TURN_SCORE || score > MAX_TURN_SCORE) {
            throw new InvalidScoreError('score', score, `an integer in ${MIN_TURN_SCORE}..${MAX_TURN_SCORE}`);
        }

        const turn = await this.store.transaction(async (scope) => {
            const existing = await scope.findTurn(turnId, { lock: true });
            if (!existing) {
                throw new NotFoundError('ChatTurn', turnId);
            }
            if (existing.answer !== null) {
                throw new AlreadyAnsweredError(turnId);
            }

            existing.answer = answer;
            existing.score = score;
            existing.answeredAt = this.clock();
            return scope.saveTurn(existing);
        });

        this.logger.info({ interviewId: turn.interviewId, turnId, level: turn.level }, 'Chat turn answered');
        return turn;
    }

    listTurns(interviewId: number): Promise<ChatTurnRecord[]> {
        return this.store.transaction((scope) => scope.listTurns(interviewId));
    }

    async getTurn(turnId: number): Promise<ChatTurnRecord> {
        const turn = await this.store.transaction((scope) => scope.findTurn(turnId));
        if (!turn) {
            throw new NotFoundError('ChatTurn', turnId);
        }
        return turn;
    }
}

// Singleton instance
let chatLedger: ChatLedgerService | null = null;

export function getChatLedger(): ChatLedgerService {
    if (!chatLedger) {
        chatLedger = ChatLedgerService.create();
    }
    return chatLedger;
}
