import { z } from 'zod';
import { errorFields, logger, type ILogger } from '../config/logger';
import { DependencyUnavailableError } from '../errors/engine-errors';
import type { JudgeVerdict } from '../types/evaluation';
import { getOpenAIService, type ChatMessage, type IOpenAIService } from './openai.service';

export interface IAnswerJudge {
    score(question: string, answer: string): Promise<JudgeVerdict>;
}

// Categorical judge labels spread over the whole [0, 1] scale
export const LABEL_SCORES = {
    low: 0,
    medium: 0.5,
    high: 1
} as const;

const dimensionValue = z
    .union([
        z.string().trim().toLowerCase().pipe(z.enum(['low', 'medium', 'high'])).transform((label) => LABEL_SCORES[label]),
        z.number().min(0).max(1)
    ])
    .nullable()
    .default(null);

const explanation = z.string().nullable().default(null);

const verdictSchema = z.object({
    factualAccuracy: dimensionValue,
    factualAccuracyExplanation: explanation,
    completeness: dimensionValue,
    completenessExplanation: explanation,
    relevance: dimensionValue,
    relevanceExplanation: explanation,
    coherence: dimensionValue,
    coherenceExplanation: explanation,
    finalEvaluation: explanation
});

export type RawVerdict = z.input<typeof verdictSchema>;

function buildMessages(question: string, answer: string): ChatMessage[] {
    return [
        {
            role: 'system',
            content: `You are an expert technical interviewer grading one answer. Rate the answer on four dimensions, each "low", "medium" or "high":
factualAccuracy, completeness, relevance, coherence.
Give a one-sentence explanation per dimension and a short overall summary. Respond ONLY with JSON:
{
    "factualAccuracy": "<low|medium|high>",
    "factualAccuracyExplanation": "<string>",
    "completeness": "<low|medium|high>",
    "completenessExplanation": "<string>",
    "relevance": "<low|medium|high>",
    "relevanceExplanation": "<string>",
    "coherence": "<low|medium|high>",
    "coherenceExplanation": "<string>",
    "finalEvaluation": "<string>"
}`
        },
        {
            role: 'user',
            content: `Question: ${question}

Candidate answer: ${answer}`
        }
    ];
}

/**
 * Answer Judge
 *
 * Scores one answer with the LLM. Anything short of a well-formed verdict
 * (API failure, invalid JSON, unknown label, out-of-range number) is a
 * DependencyUnavailable error and nothing is recorded.
 */
export class AnswerJudgeService implements IAnswerJudge {
    constructor(
        private openai: IOpenAIService,
        private logger: ILogger
    ) { }

    /**
     * Factory method for production use
     */
    static create(): AnswerJudgeService {
        return new AnswerJudgeService(getOpenAIService(), logger);
    }

    async score(question: string, answer: string): Promise<JudgeVerdict> {
        try {
            const { data, usage } = await this.openai.generateJsonCompletion(buildMessages(question, answer));
            const verdict = verdictSchema.parse(data);

            return {
                scores: {
                    factualAccuracy: verdict.factualAccuracy,
                    completeness: verdict.completeness,
                    relevance: verdict.relevance,
                    coherence: verdict.coherence
                },
                explanations: {
                    factualAccuracy: verdict.factualAccuracyExplanation,
                    completeness: verdict.completenessExplanation,
                    relevance: verdict.relevanceExplanation,
                    coherence: verdict.coherenceExplanation
                },
                finalEvaluation: verdict.finalEvaluation,
                tokens: usage
            };
        } catch (error) {
            this.logger.error({ questionLength: question.length, ...errorFields(error) }, 'Answer judging failed');
            throw new DependencyUnavailableError('Answer judge', error);
        }
    }
}

// Singleton instance
let answerJudge: AnswerJudgeService | null = null;

export function getAnswerJudge(): AnswerJudgeService {
    if (!answerJudge) {
        answerJudge = AnswerJudgeService.create();
    }
    return answerJudge;
}
