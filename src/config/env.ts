import { config as loadDotenv } from 'dotenv';
import { z } from 'zod';

loadDotenv();

const booleanFlag = z
    .enum(['true', 'false', '1', '0'])
    .transform(value => value === 'true' || value === '1');

const envSchema = z.object({
    PORT: z.coerce.number().int().positive().default(3000),
    NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
    LOG_LEVEL: z.string().default('info'),
    DATABASE_URL: z.string().optional(),
    REDIS_URL: z.string().default('redis://localhost:6379'),
    OPENAI_API_KEY: z.string().optional(),
    EXTRACT_MODEL: z.string().min(1).default('gpt-4o'),
    MATCH_MODEL: z.string().min(1).default('gpt-4o-mini'),
    LLM_TEMPERATURE: z.coerce.number().min(0).max(2).default(0),
    LLM_TOP_P: z.coerce.number().min(0).max(1).default(1),
    ARTIFACTS_DIR: z.string().min(1).default('./artifacts'),
    STORAGE_DIR: z.string().min(1).default('./storage'),
    MIN_QUOTE_LENGTH: z.coerce.number().int().min(1).default(12),
    REJECT_EMPTY_EVIDENCE: booleanFlag.default('true'),
    EVAL_MAX_ATTEMPTS: z.coerce.number().int().min(1).default(3),
    EVAL_BACKOFF_MS: z.coerce.number().int().min(0).default(1000),
    EVAL_CONCURRENCY: z.coerce.number().int().min(1).default(1)
});

export type Env = z.infer<typeof envSchema>;

export interface ModelSettings {
    modelId: string;
    temperature: number;
    topP: number;
}

/**
 * Application configuration, resolved once from the environment.
 *
 * Model identifiers live here rather than in module constants so that the
 * generation adapters receive them explicitly.
 */
export interface AppConfig {
    port: number;
    nodeEnv: Env['NODE_ENV'];
    logLevel: string;
    databaseUrl?: string;
    redisUrl: string;
    openaiApiKey?: string;
    extraction: ModelSettings;
    matching: ModelSettings;
    artifactsDir: string;
    storageDir: string;
    minQuoteLength: number;
    rejectEmptyEvidence: boolean;
    queue: {
        maxAttempts: number;
        backoffMs: number;
        concurrency: number;
    };
}

export function parseConfig(source: NodeJS.ProcessEnv): AppConfig {
    const result = envSchema.safeParse(source);
    if (!result.success) {
        const details = result.error.errors
            .map(issue => `${issue.path.join('.')}: ${issue.message}`)
            .join('; ');
        throw new Error(`Invalid environment configuration: ${details}`);
    }

    const env = result.data;
    return {
        port: env.PORT,
        nodeEnv: env.NODE_ENV,
        logLevel: env.LOG_LEVEL,
        databaseUrl: env.DATABASE_URL,
        redisUrl: env.REDIS_URL,
        openaiApiKey: env.OPENAI_API_KEY,
        extraction: {
            modelId: env.EXTRACT_MODEL,
            temperature: env.LLM_TEMPERATURE,
            topP: env.LLM_TOP_P
        },
        matching: {
            modelId: env.MATCH_MODEL,
            temperature: env.LLM_TEMPERATURE,
            topP: env.LLM_TOP_P
        },
        artifactsDir: env.ARTIFACTS_DIR,
        storageDir: env.STORAGE_DIR,
        minQuoteLength: env.MIN_QUOTE_LENGTH,
        rejectEmptyEvidence: env.REJECT_EMPTY_EVIDENCE,
        queue: {
            maxAttempts: env.EVAL_MAX_ATTEMPTS,
            backoffMs: env.EVAL_BACKOFF_MS,
            concurrency: env.EVAL_CONCURRENCY
        }
    };
}

// Singleton instance
let appConfig: AppConfig | null = null;

export function getConfig(): AppConfig {
    if (!appConfig) {
        appConfig = parseConfig(process.env);
    }
    return appConfig;
}
