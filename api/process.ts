import { Router } from 'express';
import { z } from 'zod';
import { currentUser, requireAuth } from '../server/auth/middleware';
import type { TokenVerifier } from '../server/auth/verifier';
import { adapt, HttpError } from '../server/errors';
import { isOverlayOperation, requiresSecondLayer, runOverlay } from '../services/overlay';
import { readZipShapefile } from '../services/shapefile';
import { uploadedFile, type Upload } from './upload';

const processFormSchema = z.object({
    operation: z.string(),
});

interface ProcessRouteDeps {
    verifier: TokenVerifier;
    upload: Upload;
}

/**
 * POST /process
 * multipart: operation, file_a (zipped shapefile), file_b (zipped shapefile, all but dissolve)
 */
export function createProcessRouter({ verifier, upload }: ProcessRouteDeps) {
    const r = Router();

    r.post(
        '/process',
        requireAuth(verifier),
        upload.fields([
            { name: 'file_a', maxCount: 1 },
            { name: 'file_b', maxCount: 1 },
        ]),
        adapt(async (req, res) => {
            const user = currentUser(req);
            const { operation } = processFormSchema.parse(req.body ?? {});
            if (!isOverlayOperation(operation)) {
                throw new HttpError(400, `Operation '${operation}' not supported.`);
            }

            const fileA = uploadedFile(req, 'file_a');
            const fileB = uploadedFile(req, 'file_b');
            if (!fileA) {
                throw new HttpError(400, 'file_a: Required');
            }
            if (requiresSecondLayer(operation) && !fileB) {
                throw new HttpError(400, `Operation '${operation}' requires two files.`);
            }

            console.log(`[Process] ${operation} requested by ${user.id}`);
            const a = await readZipShapefile(fileA.buffer);
            const b = fileB && requiresSecondLayer(operation) ? await readZipShapefile(fileB.buffer) : undefined;

            const result = runOverlay(operation, a, b);
            console.log(
                `[Process] ${operation}: ${a.features.length} + ${b?.features.length ?? 0} features -> ${result.features.length}`
            );

            res.json(result);
        })
    );

    return r;
}
