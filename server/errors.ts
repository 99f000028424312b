import type { ErrorRequestHandler, NextFunction, Request, RequestHandler, Response } from 'express';
import multer from 'multer';
import { ZodError } from 'zod';

export class HttpError extends Error {
    constructor(
        public readonly status: number,
        message: string
    ) {
        super(message);
        this.name = 'HttpError';
    }
}

export const EMPTY_RESULT_MESSAGE = 'The operation resulted in an empty geometry.';

type AsyncHandler = (req: Request, res: Response, next: NextFunction) => Promise<void>;

// Express 4 does not await handlers, so rejections are handed to the error middleware here.
export const adapt =
    (handler: AsyncHandler): RequestHandler =>
    (req, res, next) => {
        handler(req, res, next).catch(next);
    };

// multer's own wording changes between releases; clients see these instead.
const MULTER_MESSAGES: Record<string, string | undefined> = {
    LIMIT_FILE_SIZE: 'File too large',
    LIMIT_FILE_COUNT: 'Too many files',
    LIMIT_UNEXPECTED_FILE: 'Unexpected file field',
};

function multerStatus(err: multer.MulterError): { status: number; message: string } {
    const status = err.code === 'LIMIT_FILE_SIZE' ? 413 : 400;
    const base = MULTER_MESSAGES[err.code] ?? err.message;
    return { status, message: err.field ? `${base}: ${err.field}` : base };
}

function toStatus(err: unknown): { status: number; message: string } {
    if (err instanceof HttpError) {
        return { status: err.status, message: err.message };
    }
    if (err instanceof multer.MulterError) {
        return multerStatus(err);
    }
    if (err instanceof ZodError) {
        const issue = err.issues[0];
        const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
        return { status: 400, message: issue ? `${where}${issue.message}` : 'Invalid request' };
    }
    const message = err instanceof Error ? err.message : String(err);
    return { status: 500, message: message || 'Internal Server Error' };
}

export const errorHandler: ErrorRequestHandler = (err: unknown, req, res, next) => {
    if (res.headersSent) {
        next(err);
        return;
    }

    const { status, message } = toStatus(err);
    if (status >= 500) {
        console.error(`[Server] ${req.method} ${req.originalUrl} failed:`, err);
    }
    res.status(status).json({ error: message });
};

export const notFound: RequestHandler = (_req, res) => {
    res.status(404).json({ error: 'Not found' });
};
