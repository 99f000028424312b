import { describe, expect, it } from 'vitest';
import { ConfigError, loadConfig } from './config';

function configError(env: Record<string, string>): ConfigError {
    try {
        loadConfig(env);
    } catch (e) {
        if (e instanceof ConfigError) return e;
        throw e;
    }
    throw new Error('expected a ConfigError');
}

describe('loadConfig', () => {
    it('applies defaults', () => {
        expect(loadConfig({ AUTH_JWT_SECRET: 'test-secret' })).toEqual({
            port: 8000,
            nodeEnv: 'development',
            auth: { provider: 'jwt', jwtSecret: 'test-secret' },
            corsOrigins: '*',
            maxUploadBytes: 50 * 1024 * 1024,
            maxBufferMeters: 100000,
            keepAlive: null,
        });
    });

    it('uses Supabase when its credentials are present', () => {
        const config = loadConfig({
            SUPABASE_URL: 'https://example.supabase.co',
            SUPABASE_SERVICE_KEY: 'test-service-key',
        });
        expect(config.auth).toEqual({
            provider: 'supabase',
            supabaseUrl: 'https://example.supabase.co',
            supabaseServiceKey: 'test-service-key',
        });
    });

    it('honours an explicit jwt provider', () => {
        const config = loadConfig({
            AUTH_PROVIDER: 'jwt',
            SUPABASE_URL: 'https://example.supabase.co',
            SUPABASE_SERVICE_KEY: 'test-service-key',
            AUTH_JWT_SECRET: 'test-secret',
        });
        expect(config.auth).toEqual({ provider: 'jwt', jwtSecret: 'test-secret' });
    });

    it('requires the service key for Supabase', () => {
        const err = configError({ SUPABASE_URL: 'https://example.supabase.co' });
        expect(err.issues).toEqual(['SUPABASE_SERVICE_KEY: required when AUTH_PROVIDER is supabase']);
    });

    it('requires a secret when no Supabase project is configured', () => {
        expect(configError({}).issues).toEqual(['AUTH_JWT_SECRET: required when AUTH_PROVIDER is jwt']);
    });

    it('treats empty variables as unset', () => {
        const config = loadConfig({ AUTH_JWT_SECRET: 'test-secret', PORT: '', CORS_ORIGINS: '' });
        expect(config.port).toBe(8000);
        expect(config.corsOrigins).toBe('*');
    });

    it('rejects a port that is not a number', () => {
        const err = configError({ AUTH_JWT_SECRET: 'test-secret', PORT: 'eighty' });
        expect(err.issues.some((issue) => issue.startsWith('PORT:'))).toBe(true);
    });

    it('splits a list of CORS origins', () => {
        const config = loadConfig({
            AUTH_JWT_SECRET: 'test-secret',
            CORS_ORIGINS: 'http://localhost:5173, https://maps.example.com',
        });
        expect(config.corsOrigins).toEqual(['http://localhost:5173', 'https://maps.example.com']);
    });

    it('enables keep-alive from the Render URL', () => {
        const config = loadConfig({
            AUTH_JWT_SECRET: 'test-secret',
            RENDER_EXTERNAL_URL: 'https://geo-api.onrender.com/',
        });
        expect(config.keepAlive).toEqual({ url: 'https://geo-api.onrender.com', intervalMs: 14 * 60 * 1000 });
    });

    it('prefers an explicit keep-alive URL and interval', () => {
        const config = loadConfig({
            AUTH_JWT_SECRET: 'test-secret',
            RENDER_EXTERNAL_URL: 'https://geo-api.onrender.com',
            KEEP_ALIVE_URL: 'https://api.example.com',
            KEEP_ALIVE_INTERVAL_MIN: '5',
        });
        expect(config.keepAlive).toEqual({ url: 'https://api.example.com', intervalMs: 300000 });
    });
});
