import OpenAI from 'openai';
import { logger, type ILogger } from '../config/logger';
import { getConfig } from '../config/env';
import { RetryUtil, type IRetryUtil } from '../utils/retry.util';

export type ChatMessage = OpenAI.ChatCompletionMessageParam;

// Interfaces for better testability
export interface IChatClient {
    chat: {
        completions: {
            create(params: OpenAI.ChatCompletionCreateParamsNonStreaming): Promise<OpenAI.ChatCompletion>;
        };
    };
    models: {
        retrieve(model: string): Promise<unknown>;
    };
}

export interface CompletionOptions {
    model: string;
    temperature: number;
    topP: number;
    maxTokens?: number;
    jsonMode?: boolean;
}

export interface IOpenAIService {
    generateCompletion(messages: ChatMessage[], options: CompletionOptions): Promise<string>;
    generateStructuredCompletion(messages: ChatMessage[], options: Omit<CompletionOptions, 'jsonMode'>): Promise<unknown>;
    testConnection(model: string): Promise<boolean>;
}

/**
 * Raised when a completion is not parseable JSON. Retried once, since a
 * second sample usually parses.
 */
export class InvalidModelOutputError extends Error {
    readonly retryable = true;

    constructor(details: string) {
        super(`Invalid JSON from model: ${details}`);
        this.name = 'InvalidModelOutputError';
    }
}

/**
 * Strip a surrounding markdown code fence, if the model added one
 */
export function stripCodeFence(content: string): string {
    const text = content.trim();
    const fenced = /^```[a-zA-Z]*\s*\n([\s\S]*?)\n?```$/.exec(text);
    return fenced ? fenced[1].trim() : text;
}

/**
 * OpenAI Service with Dependency Injection
 *
 * The generation boundary. Everything returned from here is untrusted and
 * goes through the normalizer, the match adapter and the quote validator
 * before it can influence a score.
 */
export class OpenAIService implements IOpenAIService {
    constructor(
        private client: IChatClient,
        private retryUtil: IRetryUtil,
        private logger: ILogger,
        private defaultMaxTokens: number = 4000
    ) { }

    /**
     * Factory method for production use
     */
    static create(): OpenAIService {
        const client = new OpenAI({
            apiKey: getConfig().openaiApiKey
        });

        return new OpenAIService(client, RetryUtil, logger);
    }

    /**
     * Generate LLM completion
     */
    async generateCompletion(messages: ChatMessage[], options: CompletionOptions): Promise<string> {
        return await this.retryUtil.executeWithRetry(
            async () => {
                this.logger.info({
                    messagesCount: messages.length,
                    model: options.model,
                    temperature: options.temperature
                }, 'Generating OpenAI completion');

                const response = await this.client.chat.completions.create({
                    model: options.model,
                    messages,
                    temperature: options.temperature,
                    top_p: options.topP,
                    max_tokens: options.maxTokens ?? this.defaultMaxTokens,
                    response_format: options.jsonMode ? { type: 'json_object' } : undefined
                });

                const content = response.choices[0]?.message?.content;
                if (!content) {
                    throw new Error('No content returned from OpenAI');
                }

                this.logger.info({
                    tokensUsed: response.usage?.total_tokens ?? 0,
                    contentLength: content.length
                }, 'OpenAI completion generated successfully');

                return content;
            },
            {
                maxAttempts: 3,
                baseDelay: 1000,
                maxDelay: 5000,
                operationName: 'OpenAI completion generation'
            }
        );
    }

    /**
     * Generate a JSON completion and parse it. The parsed value is returned
     * untyped; callers narrow it.
     */
    async generateStructuredCompletion(
        messages: ChatMessage[],
        options: Omit<CompletionOptions, 'jsonMode'>
    ): Promise<unknown> {
        return await this.retryUtil.executeWithRetry(
            async () => {
                const content = await this.generateCompletion(messages, { ...options, jsonMode: true });

                let parsed: unknown;
                try {
                    parsed = JSON.parse(stripCodeFence(content));
                } catch (error) {
                    throw new InvalidModelOutputError(error instanceof Error ? error.message : 'unparseable content');
                }

                this.logger.info({
                    model: options.model,
                    topLevelType: Array.isArray(parsed) ? 'array' : typeof parsed
                }, 'Structured completion parsed successfully');

                return parsed;
            },
            {
                maxAttempts: 2,
                baseDelay: 0,
                operationName: 'Structured completion parsing',
                // Transport failures were already retried inside generateCompletion
                shouldRetry: error => error instanceof InvalidModelOutputError
            }
        );
    }

    /**
     * Test OpenAI connection by looking up the configured model
     */
    async testConnection(model: string): Promise<boolean> {
        try {
            await this.client.models.retrieve(model);
            this.logger.info({ model }, 'OpenAI connection test successful');
            return true;
        } catch (error: unknown) {
            this.logger.error({
                model,
                error: error instanceof Error ? error.message : 'Unknown error'
            }, 'OpenAI connection test failed');
            return false;
        }
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
