import { z } from 'zod';
import { ConfigurationError } from './errors';
import { DEFAULT_MAX_FRAME_BYTES, MAX_FRAME_LIMIT } from './codec';
import type { LogLevelName } from './utils/Logger';

export const DEFAULT_PORT = 54321;

export interface SessionConfig {
    /** Port the host listens on, and the default port a client dials. 0 picks a free port. */
    port: number;
    /** Interface the host binds to. */
    bindAddress: string;
    /** How long a client waits for the TCP handshake. */
    connectTimeoutMs: number;
    /** Largest frame body accepted from the peer. */
    maxFrameBytes: number;
    logLevel: LogLevelName;
    logJson: boolean;
}

export const DEFAULT_CONFIG: SessionConfig = {
    port: DEFAULT_PORT,
    bindAddress: '127.0.0.1',
    connectTimeoutMs: 5000,
    maxFrameBytes: DEFAULT_MAX_FRAME_BYTES,
    logLevel: 'info',
    logJson: false,
};

const ConfigSchema = z.object({
    port: z.number().int().min(0).max(65535),
    bindAddress: z.string().ip(),
    connectTimeoutMs: z.number().int().positive(),
    maxFrameBytes: z.number().int().positive().max(MAX_FRAME_LIMIT),
    logLevel: z.enum(['debug', 'info', 'warn', 'error', 'none']),
    logJson: z.boolean(),
});

const EnvSchema = z.object({
    PAIRPEN_PORT: z.coerce.number().optional(),
    PAIRPEN_BIND_ADDRESS: z.string().optional(),
    PAIRPEN_CONNECT_TIMEOUT_MS: z.coerce.number().optional(),
    PAIRPEN_MAX_FRAME_BYTES: z.coerce.number().optional(),
    PAIRPEN_LOG_LEVEL: z.string().toLowerCase().optional(),
    PAIRPEN_LOG_JSON: z.enum(['1', '0', 'true', 'false']).optional(),
});

type Env = Record<string, string | undefined>;

/**
 * Reads the PAIRPEN_* variables into a partial config. Unset or empty
 * variables are skipped.
 */
export function configFromEnv(env: Env): Partial<Record<keyof SessionConfig, unknown>> {
    const present: Env = {};
    for (const [key, value] of Object.entries(env)) {
        if (key.startsWith('PAIRPEN_') && value !== undefined && value.trim() !== '') {
            present[key] = value.trim();
        }
    }

    const parsed = EnvSchema.safeParse(present);
    if (!parsed.success) {
        throw new ConfigurationError(`Invalid environment: ${formatIssues(parsed.error)}`);
    }

    const vars = parsed.data;
    const out: Partial<Record<keyof SessionConfig, unknown>> = {};
    if (vars.PAIRPEN_PORT !== undefined) out.port = vars.PAIRPEN_PORT;
    if (vars.PAIRPEN_BIND_ADDRESS !== undefined) out.bindAddress = vars.PAIRPEN_BIND_ADDRESS;
    if (vars.PAIRPEN_CONNECT_TIMEOUT_MS !== undefined) out.connectTimeoutMs = vars.PAIRPEN_CONNECT_TIMEOUT_MS;
    if (vars.PAIRPEN_MAX_FRAME_BYTES !== undefined) out.maxFrameBytes = vars.PAIRPEN_MAX_FRAME_BYTES;
    if (vars.PAIRPEN_LOG_LEVEL !== undefined) out.logLevel = vars.PAIRPEN_LOG_LEVEL;
    if (vars.PAIRPEN_LOG_JSON !== undefined) out.logJson = vars.PAIRPEN_LOG_JSON === '1' || vars.PAIRPEN_LOG_JSON === 'true';
    return out;
}

/**
 * Defaults, then environment, then explicit overrides; validated as a whole.
 * @throws {ConfigurationError}
 */
export function resolveConfig(overrides: Partial<SessionConfig> = {}, env: Env = process.env): SessionConfig {
    const defined: Partial<SessionConfig> = {};
    for (const [key, value] of Object.entries(overrides)) {
        if (value !== undefined) {
            Object.assign(defined, { [key]: value });
        }
    }

    const merged = { ...DEFAULT_CONFIG, ...configFromEnv(env), ...defined };
    const result = ConfigSchema.safeParse(merged);
    if (!result.success) {
        throw new ConfigurationError(`Invalid configuration: ${formatIssues(result.error)}`);
    }
    return result.data;
}

function formatIssues(error: z.ZodError): string {
    return error.issues
        .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        .join('; ');
}
