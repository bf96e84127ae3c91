/**
 * config.ts
 *
 * Reads the environment once and turns it into explicit configuration for the
 * client and the HTTP gateway. Library code never reads `process.env` itself;
 * the bootstrap (or `initialise`) passes the environment in.
 *
 * Recognised variables:
 * - `D2_API_KEY` (required): upstream API key
 * - `DOTA2_API_BASE_URL`, `DOTA2_LANGUAGE`, `DOTA2_TIMEOUT_SECONDS`
 * - `PORT`, `FASTIFY_LOG_LEVEL`, `CORS_ORIGIN`, `ALLOW_ADMIN`
 * - `REFERENCE_DATA_DIR`
 * - `OTEL_ENABLED`, `OTEL_EXPORTER_OTLP_TRACES_ENDPOINT`
 */

import {z} from 'zod';
import {Dota2Client} from './dota/client.js';
import type {ClientConfig, ClientDeps} from './dota/client.js';
import {DEFAULT_BASE_URL, DEFAULT_LANGUAGE} from './dota/endpoints.js';
import {InvalidParamsError, MissingCredentialError} from './dota/errors.js';

export type Env = Record<string, string | undefined>;

const flag = z.enum(['true', 'false', '1', '0']).default('false').transform((v) => v === 'true' || v === '1');

const clientEnvSchema = z.object({
    D2_API_KEY: z.string().trim().min(1).optional(),
    DOTA2_API_BASE_URL: z.string().url().default(DEFAULT_BASE_URL),
    DOTA2_LANGUAGE: z.string().trim().min(1).default(DEFAULT_LANGUAGE),
    DOTA2_TIMEOUT_SECONDS: z.coerce.number().positive().finite().optional(),
});

const serverEnvSchema = z.object({
    PORT: z.coerce.number().int().min(0).max(65535).default(8080),
    FASTIFY_LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('warn'),
    CORS_ORIGIN: z.string().default('*'),
    ALLOW_ADMIN: flag,
    REFERENCE_DATA_DIR: z.string().min(1).default('./data'),
    OTEL_ENABLED: flag,
    OTEL_EXPORTER_OTLP_TRACES_ENDPOINT: z.string().url().default('http://otel-collector:4318/v1/traces'),
});

export interface ServerConfig {
    port: number;
    logLevel: 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';
    corsOrigin: string;
    allowAdmin: boolean;
    referenceDataDir: string;
    otelEnabled: boolean;
    otelTracesEndpoint: string;
}

export interface AppConfig {
    client: ClientConfig;
    server: ServerConfig;
}

function withoutBlanks(env: Env): Env {
    const cleaned: Env = {};
    for (const [name, value] of Object.entries(env)) {
        if (value !== undefined && value.trim() !== '') cleaned[name] = value;
    }
    return cleaned;
}

function parseEnv<S extends z.ZodTypeAny>(schema: S, env: Env): z.output<S> {
    const parsed = schema.safeParse(withoutBlanks(env));
    if (!parsed.success) throw new InvalidParamsError('config', parsed.error.issues);
    return parsed.data;
}

/** Client settings only; server variables are not read or validated. */
export function loadClientConfig(env: Env): ClientConfig {
    const values = parseEnv(clientEnvSchema, env);
    if (!values.D2_API_KEY) throw new MissingCredentialError();
    return {
        apiKey: values.D2_API_KEY,
        baseUrl: values.DOTA2_API_BASE_URL,
        language: values.DOTA2_LANGUAGE,
        timeoutSeconds: values.DOTA2_TIMEOUT_SECONDS,
    };
}

export function loadConfig(env: Env): AppConfig {
    const client = loadClientConfig(env);
    const values = parseEnv(serverEnvSchema, env);
    return {
        client,
        server: {
            port: values.PORT,
            logLevel: values.FASTIFY_LOG_LEVEL,
            corsOrigin: values.CORS_ORIGIN,
            allowAdmin: values.ALLOW_ADMIN,
            referenceDataDir: values.REFERENCE_DATA_DIR,
            otelEnabled: values.OTEL_ENABLED,
            otelTracesEndpoint: values.OTEL_EXPORTER_OTLP_TRACES_ENDPOINT,
        },
    };
}

/**
 * Create a client from an explicit key or, when none is given, from
 * `D2_API_KEY` in `env`. Throws `MissingCredentialError` when neither is set.
 */
export function initialise(options: {apiKey?: string} = {}, env: Env = process.env, deps: ClientDeps = {}): Dota2Client {
    const apiKey = options.apiKey?.trim() || env.D2_API_KEY;
    return new Dota2Client(loadClientConfig({...env, D2_API_KEY: apiKey}), deps);
}
