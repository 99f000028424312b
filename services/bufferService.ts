// services/bufferService.ts
import { bbox, buffer, featureCollection, featureEach } from '@turf/turf';
import type { Feature, MultiPolygon, Polygon } from 'geojson';
import { EMPTY_RESULT_MESSAGE, HttpError } from '../server/errors';
import type { Layer, UtmCrs } from '../types';
import { estimateUtmCrs } from './crs';
import { hasCoordinates } from './geojsonReader';
import { numberFeatures } from './overlay';

export interface BufferResult {
    collection: Layer;
    utm: UtmCrs;
}

/**
 * Buffers every feature by `meters` (negative shrinks polygons).
 * Distances are geodesic: turf measures them in a local azimuthal projection
 * around each feature, which agrees with a buffer computed in the feature's
 * UTM zone to well under a metre at city scale.
 */
export function bufferLayer(layer: Layer, meters: number): BufferResult {
    // turf cannot buffer a geometry without coordinates
    const features = layer.features.filter(hasCoordinates);
    if (features.length === 0) {
        throw new HttpError(404, EMPTY_RESULT_MESSAGE);
    }

    const utm = estimateUtmCrs(bbox(featureCollection(features)));

    const polygons: Feature<Polygon | MultiPolygon>[] = [];
    for (const feature of features) {
        const result = buffer(featureCollection([feature]), meters, { units: 'meters' });
        if (!result) continue;
        featureEach(result, (piece) => {
            if (piece.geometry.coordinates.length > 0) {
                polygons.push({ type: 'Feature', geometry: piece.geometry, properties: {} });
            }
        });
    }

    if (polygons.length === 0) {
        throw new HttpError(404, EMPTY_RESULT_MESSAGE);
    }
    return { collection: numberFeatures(polygons), utm };
}
