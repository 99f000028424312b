import { Router } from 'express';
import { z } from 'zod';
import { currentUser, requireAuth } from '../server/auth/middleware';
import type { TokenVerifier } from '../server/auth/verifier';
import { adapt, HttpError } from '../server/errors';
import { bufferLayer } from '../services/bufferService';
import { readGeoJson } from '../services/geojsonReader';
import type { Upload } from './upload';

export function bufferFormSchema(maxBufferMeters: number) {
    return z.object({
        buffer_value: z
            .string()
            .trim()
            .regex(/^[-+]?\d+$/, 'must be an integer')
            .transform(Number)
            .refine((meters) => meters !== 0, 'must not be zero')
            .refine(
                (meters) => Math.abs(meters) <= maxBufferMeters,
                `must be between -${maxBufferMeters} and ${maxBufferMeters}`
            ),
    });
}

interface BufferRouteDeps {
    verifier: TokenVerifier;
    upload: Upload;
    maxBufferMeters: number;
}

/**
 * POST /buffer
 * multipart: geojson_polygon (file), buffer_value (integer metres)
 * Responds with the buffered polygons as a FeatureCollection in EPSG:4326.
 */
export function createBufferRouter({ verifier, upload, maxBufferMeters }: BufferRouteDeps) {
    const schema = bufferFormSchema(maxBufferMeters);
    const r = Router();

    r.post(
        '/buffer',
        requireAuth(verifier),
        upload.single('geojson_polygon'),
        adapt(async (req, res) => {
            const user = currentUser(req);
            console.log(`[Buffer] Request received from authenticated user: ${user.id}`);

            const { buffer_value } = schema.parse(req.body ?? {});
            if (!req.file) {
                throw new HttpError(400, 'geojson_polygon: Required');
            }

            const layer = await readGeoJson(req.file.buffer);
            const { collection, utm } = bufferLayer(layer, buffer_value);
            console.log(`[Buffer] Detected optimal UTM CRS: EPSG:${utm.epsg}`);

            res.json(collection);
        })
    );

    return r;
}
