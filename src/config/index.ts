import dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigurationError } from '../shared/utils/errors';

dotenv.config();

const optionalString = z
    .string()
    .optional()
    .transform((value) => (value && value.trim().length ? value.trim() : undefined));

// VAR= in .env means "use the default"
const blankAsUndefined = (value: unknown) =>
    typeof value === 'string' && !value.trim().length ? undefined : value;

const timeoutMs = z
    .preprocess(
        (value) => {
            if (typeof value !== 'string' || !value.trim().length) return undefined;
            return Number(value);
        },
        z.number().int().positive().optional(),
    )
    .transform((value) => value ?? 120_000);

const envSchema = z.object({
    NODE_ENV: z.string().default('development'),
    LOG_LEVEL: z.preprocess(
        blankAsUndefined,
        z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']).default('info'),
    ),
    LOG_DIR: optionalString,
    HABITICA_BASE_URL: z.preprocess(
        blankAsUndefined,
        z
            .string()
            .url()
            .default('https://habitica.com')
            .transform((value) => value.replace(/\/$/, '')),
    ),
    REQUEST_TIMEOUT_MS: timeoutMs,
    HABITICA_API_USER: optionalString,
    HABITICA_API_KEY: optionalString,
});

export type EnvConfig = {
    nodeEnv: string;
    logLevel: string;
    logDir?: string;
    habiticaBaseUrl: string;
    requestTimeoutMs: number;
    apiUser?: string;
    apiKey?: string;
};

// read process-level settings (env / .env)
export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): EnvConfig {
    const parsed = envSchema.safeParse(env);
    if (!parsed.success) {
        const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
        throw new ConfigurationError(`Invalid environment configuration (${issues.join('; ')})`, parsed.error.flatten());
    }

    const values = parsed.data;
    return {
        nodeEnv: values.NODE_ENV,
        logLevel: values.LOG_LEVEL,
        logDir: values.LOG_DIR,
        habiticaBaseUrl: values.HABITICA_BASE_URL,
        requestTimeoutMs: values.REQUEST_TIMEOUT_MS,
        apiUser: values.HABITICA_API_USER,
        apiKey: values.HABITICA_API_KEY,
    };
}
