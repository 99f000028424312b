import cors from 'cors';
import express from 'express';
import { createBufferRouter } from '../api/buffer';
import health from '../api/health';
import { createProcessRouter } from '../api/process';
import { createUpload } from '../api/upload';
import type { TokenVerifier } from './auth/verifier';
import type { AppConfig } from './config';
import { errorHandler, notFound } from './errors';

export interface AppDeps {
    config: AppConfig;
    verifier: TokenVerifier;
}

export function createApp({ config, verifier }: AppDeps) {
    const app = express();
    app.disable('x-powered-by');

    // "*" reflects the caller's origin so credentialed requests from the map client still pass.
    app.use(
        cors({
            origin: config.corsOrigins === '*' ? true : config.corsOrigins,
            credentials: true,
        })
    );

    const upload = createUpload(config.maxUploadBytes);

    app.use(health);
    app.use(createBufferRouter({ verifier, upload, maxBufferMeters: config.maxBufferMeters }));
    app.use(createProcessRouter({ verifier, upload }));

    app.use(notFound);
    app.use(errorHandler);

    return app;
}
