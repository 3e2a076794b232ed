import * as dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigurationError } from './utils/errors.js';

const optStr = z
    .union([z.string(), z.undefined()])
    .transform(v => (v === undefined || v.trim() === '' ? undefined : v.trim()));

const configSchema = z.object({
    TALLY_HOST: z.string().min(1).default('localhost'),
    TALLY_PORT: z.coerce.number().int().min(1).max(65535).default(9000),
    DEEPINFRA_TOKEN: optStr,
    EXTRACTION_API_URL: z.string().url().default('https://api.deepinfra.com/v1/openai/chat/completions'),
    EXTRACTION_MODEL: z.string().min(1).default('meta-llama/Llama-4-Maverick-17B-128E-Instruct-FP8'),
    RESULTS_DIR: z.string().min(1).default('results'),
    COMPANY_NAME: optStr,
    MIN_POSTING_AMOUNT: z.coerce.number().positive().default(1.0),
    RECONCILIATION_TOLERANCE: z.coerce.number().nonnegative().default(1.0),
    LEDGER_CONCURRENCY: z.coerce.number().int().min(1).default(1),
    LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

export type RawConfig = z.infer<typeof configSchema>;

export interface AppConfig {
    accounting: {
        host: string;
        port: number;
        companyName?: string;
    };
    extraction: {
        token?: string;
        apiUrl: string;
        model: string;
    };
    posting: {
        minimumAmount: number;
        reconciliationTolerance: number;
        ledgerConcurrency: number;
    };
    resultsDir: string;
    logLevel: RawConfig['LOG_LEVEL'];
}

export interface ConfigOverrides {
    token?: string;
    resultsDir?: string;
}

type Env = Record<string, string | undefined>;

/**
 * Builds the configuration from `env`. Pass `process.env` after
 * {@link loadEnvFile} to pick up a local `.env`.
 */
export function loadConfig(env: Env, overrides: ConfigOverrides = {}): AppConfig {
    const parsed = configSchema.safeParse(env);
    if (!parsed.success) {
        const problems = parsed.error.issues
            .map(issue => `${issue.path.join('.')}: ${issue.message}`)
            .join('; ');
        throw new ConfigurationError(`Invalid configuration - ${problems}`);
    }

    const raw = parsed.data;
    return {
        accounting: {
            host: raw.TALLY_HOST,
            port: raw.TALLY_PORT,
            companyName: raw.COMPANY_NAME,
        },
        extraction: {
            token: overrides.token ?? raw.DEEPINFRA_TOKEN,
            apiUrl: raw.EXTRACTION_API_URL,
            model: raw.EXTRACTION_MODEL,
        },
        posting: {
            minimumAmount: raw.MIN_POSTING_AMOUNT,
            reconciliationTolerance: raw.RECONCILIATION_TOLERANCE,
            ledgerConcurrency: raw.LEDGER_CONCURRENCY,
        },
        resultsDir: overrides.resultsDir ?? raw.RESULTS_DIR,
        logLevel: raw.LOG_LEVEL,
    };
}

export function loadEnvFile(path = '.env'): void {
    dotenv.config({ path });
}

export function requireExtractionToken(config: AppConfig): string {
    if (!config.extraction.token) {
        throw new ConfigurationError(
            'DEEPINFRA_TOKEN not found. Set it in the .env file, export it, or pass --token'
        );
    }
    return config.extraction.token;
}
