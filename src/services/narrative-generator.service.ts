import { z } from 'zod';
import { logger, type ILogger } from '../config/logger';
import { DependencyUnavailableError } from '../errors/engine-errors';
import type { AggregationStatistics, Narrative } from '../types/result';
import type { INarrativeGenerator } from './aggregator.service';
import { getOpenAIService, type ChatMessage, type IOpenAIService } from './openai.service';

const narrativeSchema = z.object({
    summaryResult: z.string(),
    recommendations: z.string().nullable().default(null)
});

function percent(value: number): string {
    return `${(value * 100).toFixed(1)}%`;
}

function buildMessages(statistics: AggregationStatistics): ChatMessage[] {
    return [
        {
            role: 'system',
            content: `You are a senior hiring manager. Summarize a candidate's interview performance from the scores provided. Return JSON:
{
    "summaryResult": string (3-5 sentences),
    "recommendations": string (concrete areas to improve) or null
}`
        },
        {
            role: 'user',
            content: `Questions answered and scored: ${statistics.evaluatedCount} of ${statistics.totalQuestions}
- Factual accuracy: ${percent(statistics.averageFactualAccuracy)}
- Completeness: ${percent(statistics.averageCompleteness)}
- Relevance: ${percent(statistics.averageRelevance)}
- Coherence: ${percent(statistics.averageCoherence)}
- Overall: ${percent(statistics.averageScore)} (${statistics.passStatus})
- Knowledge level: ${statistics.knowledgeLevel}`
        }
    ];
}

/**
 * Narrative Generator
 *
 * Writes the prose part of an Interview Result. The aggregator treats it
 * as optional and stores an empty narrative when this fails.
 */
export class NarrativeGeneratorService implements INarrativeGenerator {
    constructor(
        private openai: IOpenAIService,
        private logger: ILogger
    ) { }

    /**
     * Factory method for production use
     */
    static create(): NarrativeGeneratorService {
        return new NarrativeGeneratorService(getOpenAIService(), logger);
    }

    async summarize(statistics: AggregationStatistics): Promise<Narrative> {
        try {
            const { data, usage } = await this.openai.generateJsonCompletion(buildMessages(statistics), {
                temperature: 0.3
            });
            const narrative = narrativeSchema.parse(data);

            this.logger.info({
                averageScore: statistics.averageScore,
                summaryLength: narrative.summaryResult.length,
                ...usage
            }, 'Interview narrative generated');

            return narrative;
        } catch (error) {
            throw new DependencyUnavailableError('Narrative generator', error);
        }
    }
}
