import * as dotenv from 'dotenv';
import { z } from 'zod';
import { Auth, RouterCredentials } from '../core/Auth';
import { ConfigError } from '../core/ExporterError';
import { normalizeBaseUrl } from '../client/Endpoints';
import { LOG_LEVELS, LogLevel } from '../utils/Logger';

dotenv.config();

export interface ExporterConfig {
    /** Base URL of the router web interface, e.g. `http://192.168.50.1` */
    routerHost: string;
    credentials: RouterCredentials;
    metricsPort: number;
    logLevel: LogLevel;
    refreshIntervalMs: number;
    requestTimeoutMs: number;
    backoffBaseMs: number;
    backoffCeilingMs: number;
    stalenessCeilingMs: number;
    failureThreshold: number;
    sessionTtlMs: number;
    shutdownGraceMs: number;
}

const milliseconds = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const ConfigSchema = z.object({
    routerHost: z.string({ required_error: 'is required' }).min(1).transform(normalizeBaseUrl),
    routerAuth: z.string({ required_error: 'is required' }).transform((raw, ctx) => {
        const credentials = Auth.parseAuthString(raw);
        if (!credentials) {
            ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'must be "user:password"' });
            return z.NEVER;
        }
        return credentials;
    }),
    metricsPort: z.coerce.number().int().min(1).max(65535).default(8000),
    logLevel: z.string().transform(level => level.toUpperCase()).pipe(z.enum(LOG_LEVELS)).default('INFO'),
    refreshIntervalMs: milliseconds(15000),
    requestTimeoutMs: milliseconds(10000),
    backoffBaseMs: milliseconds(2000),
    backoffCeilingMs: milliseconds(60000),
    stalenessCeilingMs: milliseconds(120000),
    failureThreshold: z.coerce.number().int().min(1).default(5),
    sessionTtlMs: milliseconds(600000),
    shutdownGraceMs: z.coerce.number().int().min(0).default(5000)
}).refine(config => config.backoffCeilingMs >= config.backoffBaseMs, {
    message: 'must not be lower than the backoff base',
    path: ['backoffCeilingMs']
});

type ConfigKey = keyof z.input<typeof ConfigSchema>;

/** Environment variable behind each setting. */
export const ENV_NAMES: Readonly<Record<ConfigKey, string>> = {
    routerHost: 'ASUS_ROUTER_HOST',
    routerAuth: 'ASUS_ROUTER_AUTH',
    metricsPort: 'ASUS_METRICS_PORT',
    logLevel: 'ASUS_LOG_LEVEL',
    refreshIntervalMs: 'ASUS_REFRESH_INTERVAL_MS',
    requestTimeoutMs: 'ASUS_REQUEST_TIMEOUT_MS',
    backoffBaseMs: 'ASUS_BACKOFF_BASE_MS',
    backoffCeilingMs: 'ASUS_BACKOFF_CEILING_MS',
    stalenessCeilingMs: 'ASUS_STALENESS_CEILING_MS',
    failureThreshold: 'ASUS_FAILURE_THRESHOLD',
    sessionTtlMs: 'ASUS_SESSION_TTL_MS',
    shutdownGraceMs: 'ASUS_SHUTDOWN_GRACE_MS'
};

/**
 * `ASUS_REFRESH_INTERVAL_MS` → `refresh-interval-ms`
 */
export function flagFor(envName: string): string {
    return envName.replace(/^ASUS_/, '').toLowerCase().replace(/_/g, '-');
}

interface Setting {
    key: string;
    env: string;
    flag: string;
}

const SETTINGS: readonly Setting[] = Object.entries(ENV_NAMES).map(([key, env]) => ({ key, env, flag: flagFor(env) }));

/**
 * Parses `--flag=value` and `--flag value` pairs.
 * Unknown flags and flags without a value are reported as issues.
 */
export function parseFlags(argv: readonly string[]): { values: Map<string, string>; issues: string[] } {
    const known = new Set(SETTINGS.map(setting => setting.flag));
    const values = new Map<string, string>();
    const issues: string[] = [];

    for (let i = 0; i < argv.length; i++) {
        const arg = argv[i];
        if (!arg.startsWith('--')) {
            issues.push(`Unexpected argument '${arg}'`);
            continue;
        }

        const eq = arg.indexOf('=');
        const flag = eq === -1 ? arg.substring(2) : arg.substring(2, eq);
        if (!known.has(flag)) {
            issues.push(`Unknown option --${flag}`);
            continue;
        }

        if (eq !== -1) {
            values.set(flag, arg.substring(eq + 1));
        } else if (i + 1 < argv.length && !argv[i + 1].startsWith('--')) {
            values.set(flag, argv[++i]);
        } else {
            issues.push(`Option --${flag} needs a value`);
        }
    }

    return { values, issues };
}

/**
 * Loads the configuration from the environment (`.env` included) and CLI flags.
 * Flags win over environment variables; empty values count as unset.
 * @throws ConfigError listing every invalid setting.
 */
export function loadConfig(
    env: NodeJS.ProcessEnv = process.env,
    argv: readonly string[] = process.argv.slice(2)
): ExporterConfig {
    const flags = parseFlags(argv);
    const raw: Record<string, string> = {};

    for (const setting of SETTINGS) {
        const value = flags.values.get(setting.flag) ?? env[setting.env];
        if (value !== undefined && value.trim() !== '') {
            raw[setting.key] = value.trim();
        }
    }

    const parsed = ConfigSchema.safeParse(raw);
    const issues = [...flags.issues];

    if (!parsed.success) {
        for (const issue of parsed.error.issues) {
            const setting = SETTINGS.find(candidate => candidate.key === issue.path[0]);
            const name = setting ? `${setting.env} (--${setting.flag})` : issue.path.join('.');
            issues.push(`${name}: ${issue.message}`);
        }
    }

    if (issues.length > 0 || !parsed.success) {
        throw new ConfigError(issues);
    }

    const { routerAuth, ...rest } = parsed.data;
    return { ...rest, credentials: routerAuth };
}

/**
 * Printable view of the configuration with the password masked.
 */
export function describeConfig(config: ExporterConfig): Record<string, string | number> {
    return {
        routerHost: config.routerHost,
        username: config.credentials.username,
        password: Auth.mask(config.credentials.password),
        metricsPort: config.metricsPort,
        logLevel: config.logLevel,
        refreshIntervalMs: config.refreshIntervalMs,
        requestTimeoutMs: config.requestTimeoutMs,
        backoffBaseMs: config.backoffBaseMs,
        backoffCeilingMs: config.backoffCeilingMs,
        stalenessCeilingMs: config.stalenessCeilingMs,
        failureThreshold: config.failureThreshold,
        sessionTtlMs: config.sessionTtlMs,
        shutdownGraceMs: config.shutdownGraceMs
    };
}
