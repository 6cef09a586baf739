/**
 * 🔒 ENVIRONMENT CONFIGURATION
 * Centralized .env with zod validation. Invalid values stop the process
 * before any network work is done.
 */

import { z } from 'zod';
import * as dotenv from 'dotenv';

import { ConfigurationError } from '../utils/errors';

/**
 * 📋 CONFIG SCHEMA - All Magic Numbers Live Here
 */
const ConfigSchema = z.object({
    // 🔑 API Keys
    GOOGLE_PLACES_API_KEY: z.string().optional(),
    ADMIN_LLM_API_KEY: z.string().optional(),
    ADMIN_LLM_BASE_URL: z.string().url().default('https://api.deepseek.com'),
    ADMIN_LLM_MODEL: z.string().min(1).default('deepseek-chat'),

    // 🌐 Rendered-page fallback
    READER_PROXY_URL: z.string().url().optional(),
    READER_PROXY_API_KEY: z.string().optional(),

    // 🗄️ Paths
    OUTPUT_DIR: z.string().default('./output'),
    CACHE_DIR: z.string().default('./data/cache'),
    LOG_DIR: z.string().default('./logs'),
    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug']).optional(),
    LOG_TO_FILE: z.enum(['true', 'false']).default('false').transform((v) => v === 'true'),

    // ⚙️ Concurrency & politeness
    CONCURRENCY_LIMIT: z.coerce.number().int().min(1).max(100).default(10),
    RATE_LIMIT_MAX_CALLS: z.coerce.number().int().min(1).max(1000).default(10),
    RATE_LIMIT_PERIOD_MS: z.coerce.number().int().min(100).max(60000).default(1000),
    HTTP_TIMEOUT_MS: z.coerce.number().int().min(1000).max(120000).default(12000),
    RETRY_ATTEMPTS: z.coerce.number().int().min(0).max(10).default(3),
    RETRY_BASE_DELAY_MS: z.coerce.number().int().min(0).max(30000).default(600),

    // 📊 Relevance thresholds
    RELEVANCE_MIN_SCORE: z.coerce.number().min(0).max(100).default(20),
    RELEVANCE_WEBSITE_THRESHOLD: z.coerce.number().default(3.0),
    RELEVANCE_NEGATIVE_WEIGHT: z.coerce.number().min(0).default(1.5),

    // 📬 Extraction & persistence
    MAX_CONTACT_PAGES: z.coerce.number().int().min(1).max(200).default(25),
    CHECKPOINT_EVERY: z.coerce.number().int().min(1).default(25),
    BACKUP_EVERY: z.coerce.number().int().min(1).default(10),

    // 🏷️ Service Identity
    SERVICE_NAME: z.string().default('lead-enricher'),
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
});

export type Config = z.infer<typeof ConfigSchema>;

type Env = Record<string, string | undefined>;

// Empty assignments in .env ("KEY=") mean "not set".
function withoutBlanks(env: Env): Env {
    return Object.fromEntries(Object.entries(env).filter(([, v]) => v !== undefined && v.trim() !== ''));
}

/**
 * 🚀 Parse and Validate Environment
 * Throws immediately if config is invalid - NO SILENT STARTUP
 */
export function loadConfig(env: Env = process.env): Config {
    const result = ConfigSchema.safeParse(withoutBlanks(env));

    if (!result.success) {
        const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
        throw new ConfigurationError(`Invalid environment configuration - ${issues.join('; ')}`);
    }

    return result.data;
}

let cached: Config | null = null;

export function getConfig(): Config {
    if (!cached) {
        dotenv.config();
        cached = loadConfig(process.env);
    }
    return cached;
}
