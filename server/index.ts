import dotenv from 'dotenv';
import { createVerifier } from './auth/verifier';
import { createApp } from './app';
import { ConfigError, loadConfig, type AppConfig } from './config';
import { startKeepAlive } from './keepAlive';

// --- GLOBAL ERROR HANDLERS ---
process.on('uncaughtException', (err) => {
    console.error('\n================================================================');
    console.error('[Server] UNCAUGHT EXCEPTION');
    console.error('Error Type:', err.name);
    console.error('Message:', err.message);
    console.error('Stack:', err.stack);
    console.error('================================================================\n');
    process.exit(1);
});

process.on('unhandledRejection', (reason) => {
    console.error('\n================================================================');
    console.error('[Server] UNHANDLED PROMISE REJECTION');
    console.error('Reason:', reason);
    if (reason instanceof Error) {
        console.error('Stack:', reason.stack);
    }
    console.error('================================================================\n');
});

// Load environment variables
dotenv.config();

let config: AppConfig;
try {
    config = loadConfig();
} catch (e) {
    console.error(e instanceof ConfigError ? `[Server] ${e.message}` : e);
    process.exit(1);
}

console.log(`[Server] Starting up in ${config.nodeEnv} mode...`);
console.log(`[Server] Node Version: ${process.version}`);
console.log(`[Server] Auth provider: ${config.auth.provider}`);

export const app = createApp({ config, verifier: createVerifier(config.auth) });

let stopKeepAlive: (() => void) | null = null;

const server = app.listen(config.port, () => {
    console.log(`[Server] Running on port ${config.port}`);
    if (config.keepAlive) {
        stopKeepAlive = startKeepAlive(config.keepAlive.url, config.keepAlive.intervalMs);
    }
});

const shutdown = (signal: string) => {
    console.log(`[Server] ${signal} received, closing...`);
    stopKeepAlive?.();
    server.close((err) => {
        if (err) {
            console.error('[Server] Close failed:', err);
            process.exit(1);
        }
        process.exit(0);
    });
};

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
