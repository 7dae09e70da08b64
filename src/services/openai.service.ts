import OpenAI from 'openai';
import { getConfig } from '../config/env';
import { logger, type ILogger } from '../config/logger';
import type { TokenCounts } from '../types/evaluation';
import { RetryUtil, type IRetryUtil, type RetryOptions } from '../utils/retry.util';

export type ChatMessage =
    | { role: 'system'; content: string }
    | { role: 'user'; content: string };

export interface CompletionOptions {
    temperature?: number;
    max_tokens?: number;
    response_format?: { type: 'json_object' };
}

// Interfaces for better testability
export interface IOpenAIClient {
    chat: {
        completions: {
            create: (params: {
                model: string;
                messages: ChatMessage[];
                temperature: number;
                max_tokens: number;
                response_format?: { type: 'json_object' };
            }) => Promise<{
                choices: Array<{ message: { content: string | null } }>;
                usage?: { prompt_tokens: number; completion_tokens: number };
            }>;
        };
    };
}

export interface Completion<T> {
    data: T;
    usage: TokenCounts;
}

export interface IOpenAIService {
    generateCompletion(messages: ChatMessage[], options?: CompletionOptions): Promise<Completion<string>>;
    generateJsonCompletion(messages: ChatMessage[], options?: CompletionOptions): Promise<Completion<unknown>>;
}

const RETRY_OPTIONS: RetryOptions = {
    maxAttempts: 3,
    baseDelay: 1000,
    maxDelay: 5000
};

/**
 * OpenAI Service with Dependency Injection
 *
 * Chat completions for the Answer Judge and the Narrative Generator.
 * Transient API failures are retried; the caller decides what a final
 * failure means.
 */
export class OpenAIService implements IOpenAIService {
    constructor(
        private client: IOpenAIClient,
        private retryUtil: IRetryUtil,
        private logger: ILogger,
        private llmModel: string = 'gpt-4o-mini',
        private temperature: number = 0.1
    ) { }

    /**
     * Factory method for production use
     */
    static create(): OpenAIService {
        const config = getConfig();
        const client = new OpenAI({ apiKey: config.openai.apiKey });

        // Pin the non-streaming overload of the SDK
        const adapter: IOpenAIClient = {
            chat: {
                completions: {
                    create: (params) => client.chat.completions.create({ ...params, stream: false })
                }
            }
        };

        return new OpenAIService(
            adapter,
            RetryUtil,
            logger,
            config.openai.model,
            config.openai.temperature
        );
    }

    /**
     * Generate LLM completion
     */
    async generateCompletion(messages: ChatMessage[], options: CompletionOptions = {}): Promise<Completion<string>> {
        return await this.retryUtil.executeWithRetry(
            async () => {
                const temperature = options.temperature ?? this.temperature;
                this.logger.debug({
                    messagesCount: messages.length,
                    model: this.llmModel,
                    temperature
                }, 'Generating OpenAI completion');

                const response = await this.client.chat.completions.create({
                    model: this.llmModel,
                    messages,
                    temperature,
                    max_tokens: options.max_tokens ?? 1000,
                    response_format: options.response_format
                });

                const content = response.choices[0]?.message.content;
                if (!content) {
                    throw new Error('No content returned from OpenAI');
                }

                const usage: TokenCounts = {
                    promptTokens: response.usage?.prompt_tokens ?? 0,
                    completionTokens: response.usage?.completion_tokens ?? 0
                };

                this.logger.info({
                    ...usage,
                    contentLength: content.length
                }, 'OpenAI completion generated successfully');

                return { data: content, usage };
            },
            { ...RETRY_OPTIONS, operationName: 'OpenAI completion generation' }
        );
    }

    /**
     * Generate a JSON-mode completion and parse it. The shape is the
     * caller's to validate.
     */
    async generateJsonCompletion(messages: ChatMessage[], options: CompletionOptions = {}): Promise<Completion<unknown>> {
        const completion = await this.generateCompletion(messages, {
            ...options,
            response_format: { type: 'json_object' }
        });

        let data: unknown;
        try {
            data = JSON.parse(completion.data);
        } catch (error) {
            throw new Error(`OpenAI returned invalid JSON: ${error instanceof Error ? error.message : String(error)}`);
        }

        return { data, usage: completion.usage };
    }
}

// Singleton instance
let openaiService: OpenAIService | null = null;

export function getOpenAIService(): OpenAIService {
    if (!openaiService) {
        openaiService = OpenAIService.create();
    }
    return openaiService;
}
