import { z } from 'zod';

export class ConfigError extends Error {
    constructor(public readonly issues: string[]) {
        super(`Invalid configuration:\n  - ${issues.join('\n  - ')}`);
        this.name = 'ConfigError';
    }
}

const emptyAsUndefined = (value: unknown) => (value === '' ? undefined : value);

const optionalString = z.preprocess(emptyAsUndefined, z.string().optional());

const envSchema = z
    .object({
        PORT: z.preprocess(emptyAsUndefined, z.coerce.number().int().min(0).max(65535).default(8000)),
        NODE_ENV: z.preprocess(
            emptyAsUndefined,
            z.enum(['development', 'production', 'test']).default('development')
        ),
        AUTH_PROVIDER: z.preprocess(emptyAsUndefined, z.enum(['supabase', 'jwt']).optional()),
        SUPABASE_URL: z.preprocess(emptyAsUndefined, z.string().url().optional()),
        SUPABASE_SERVICE_KEY: optionalString,
        AUTH_JWT_SECRET: optionalString,
        CORS_ORIGINS: z.preprocess(emptyAsUndefined, z.string().default('*')),
        MAX_UPLOAD_MB: z.preprocess(emptyAsUndefined, z.coerce.number().positive().default(50)),
        MAX_BUFFER_METERS: z.preprocess(emptyAsUndefined, z.coerce.number().int().positive().default(100_000)),
        KEEP_ALIVE_URL: z.preprocess(emptyAsUndefined, z.string().url().optional()),
        RENDER_EXTERNAL_URL: z.preprocess(emptyAsUndefined, z.string().url().optional()),
        KEEP_ALIVE_INTERVAL_MIN: z.preprocess(emptyAsUndefined, z.coerce.number().positive().default(14)),
    })
    .superRefine((env, ctx) => {
        const provider = env.AUTH_PROVIDER ?? (env.SUPABASE_URL ? 'supabase' : 'jwt');
        if (provider === 'supabase') {
            if (!env.SUPABASE_URL) {
                ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['SUPABASE_URL'], message: 'required when AUTH_PROVIDER is supabase' });
            }
            if (!env.SUPABASE_SERVICE_KEY) {
                ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['SUPABASE_SERVICE_KEY'], message: 'required when AUTH_PROVIDER is supabase' });
            }
        } else if (!env.AUTH_JWT_SECRET) {
            ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['AUTH_JWT_SECRET'], message: 'required when AUTH_PROVIDER is jwt' });
        }
    });

export type AuthConfig =
    | { provider: 'supabase'; supabaseUrl: string; supabaseServiceKey: string }
    | { provider: 'jwt'; jwtSecret: string };

export interface AppConfig {
    port: number;
    nodeEnv: 'development' | 'production' | 'test';
    auth: AuthConfig;
    // "*" means any origin
    corsOrigins: '*' | string[];
    maxUploadBytes: number;
    maxBufferMeters: number;
    keepAlive: { url: string; intervalMs: number } | null;
}

export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
    const parsed = envSchema.safeParse(env);
    if (!parsed.success) {
        throw new ConfigError(parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`));
    }
    const e = parsed.data;

    let auth: AuthConfig;
    if (e.SUPABASE_URL && e.SUPABASE_SERVICE_KEY && e.AUTH_PROVIDER !== 'jwt') {
        auth = { provider: 'supabase', supabaseUrl: e.SUPABASE_URL, supabaseServiceKey: e.SUPABASE_SERVICE_KEY };
    } else if (e.AUTH_JWT_SECRET) {
        auth = { provider: 'jwt', jwtSecret: e.AUTH_JWT_SECRET };
    } else {
        // superRefine has already rejected this combination
        throw new ConfigError(['AUTH_PROVIDER: no usable credentials']);
    }

    const origins = e.CORS_ORIGINS.split(',')
        .map((o) => o.trim())
        .filter(Boolean);
    const keepAliveUrl = e.KEEP_ALIVE_URL ?? e.RENDER_EXTERNAL_URL;

    return {
        port: e.PORT,
        nodeEnv: e.NODE_ENV,
        auth,
        corsOrigins: origins.length === 0 || origins.includes('*') ? '*' : origins,
        maxUploadBytes: Math.round(e.MAX_UPLOAD_MB * 1024 * 1024),
        maxBufferMeters: e.MAX_BUFFER_METERS,
        keepAlive: keepAliveUrl
            ? { url: keepAliveUrl.replace(/\/+$/, ''), intervalMs: Math.round(e.KEEP_ALIVE_INTERVAL_MIN * 60 * 1000) }
            : null,
    };
}
