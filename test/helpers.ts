import { createApp } from '../server/app';
import { signToken, JwtTokenVerifier } from '../server/auth/jwt';
import { loadConfig } from '../server/config';
import { HttpError } from '../server/errors';

export const TEST_SECRET = 'test-secret';

export function testApp(env: Record<string, string> = {}) {
    const config = loadConfig({ AUTH_JWT_SECRET: TEST_SECRET, NODE_ENV: 'test', ...env });
    return createApp({ config, verifier: new JwtTokenVerifier(TEST_SECRET) });
}

export function bearer(userId = 'user-1'): string {
    return `Bearer ${signToken(TEST_SECRET, { id: userId, email: `${userId}@example.com` })}`;
}

export function jsonFile(value: unknown): Buffer {
    return Buffer.from(JSON.stringify(value), 'utf-8');
}

export async function rejectionOf(promise: Promise<unknown>): Promise<HttpError> {
    try {
        await promise;
    } catch (e) {
        if (e instanceof HttpError) return e;
        throw e;
    }
    throw new Error('Expected the promise to reject with an HttpError');
}

export function thrownBy(fn: () => unknown): HttpError {
    try {
        fn();
    } catch (e) {
        if (e instanceof HttpError) return e;
        throw e;
    }
    throw new Error('Expected an HttpError to be thrown');
}
