// services/geojsonReader.ts
import { coordAll } from '@turf/turf';
import { z } from 'zod';
import type { Geometry } from 'geojson';
import { HttpError } from '../server/errors';
import type { GeoFeature, Layer } from '../types';
import { parseCrsName, reprojectToWgs84, WGS84 } from './crs';
import { isZip, readZipShapefile } from './shapefile';

const position = z.array(z.number().finite()).min(2);

const geometrySchema: z.ZodType<Geometry> = z.lazy(() =>
    z.discriminatedUnion('type', [
        z.object({ type: z.literal('Point'), coordinates: position }),
        z.object({ type: z.literal('MultiPoint'), coordinates: z.array(position) }),
        z.object({ type: z.literal('LineString'), coordinates: z.array(position) }),
        z.object({ type: z.literal('MultiLineString'), coordinates: z.array(z.array(position)) }),
        z.object({ type: z.literal('Polygon'), coordinates: z.array(z.array(position)) }),
        z.object({ type: z.literal('MultiPolygon'), coordinates: z.array(z.array(z.array(position))) }),
        z.object({ type: z.literal('GeometryCollection'), geometries: z.array(geometrySchema) }),
    ])
);

// Legacy (2008) GeoJSON crs member; RFC 7946 dropped it but GIS exports still write it.
const crsSchema = z
    .object({
        type: z.literal('name'),
        properties: z.object({ name: z.string() }),
    })
    .optional();

const featureSchema = z.object({
    type: z.literal('Feature'),
    id: z.union([z.string(), z.number()]).nullish(),
    geometry: geometrySchema.nullable(),
    properties: z.record(z.unknown()).nullish(),
});

const geoJsonSchema = z.union([
    z.object({ type: z.literal('FeatureCollection'), features: z.array(featureSchema) }),
    featureSchema,
    geometrySchema,
]);

const crsHolderSchema = z.object({ crs: crsSchema });

type FeatureInput = z.infer<typeof featureSchema>;

/** False for empty geometries such as `{"type":"Polygon","coordinates":[]}`, which RFC 7946 allows. */
export function hasCoordinates(feature: GeoFeature): boolean {
    return coordAll(feature).length > 0;
}

function toFeature(input: FeatureInput): GeoFeature | null {
    if (!input.geometry) return null;
    const feature: GeoFeature = {
        type: 'Feature',
        geometry: input.geometry,
        properties: input.properties ?? {},
    };
    if (input.id != null) feature.id = input.id;
    return hasCoordinates(feature) ? feature : null;
}

function sourceCrs(crs: z.infer<typeof crsSchema>): number {
    if (!crs) return WGS84;
    const code = parseCrsName(crs.properties.name);
    if (code === null) {
        throw new HttpError(400, `Unsupported CRS: ${crs.properties.name}`);
    }
    return code;
}

/**
 * Parses an uploaded GeoJSON document (FeatureCollection, Feature or bare
 * geometry) into a layer in EPSG:4326. A zip upload is read as a zipped shapefile.
 */
export async function readGeoJson(content: Uint8Array): Promise<Layer> {
    if (isZip(content)) {
        return readZipShapefile(content);
    }

    let raw: unknown;
    try {
        raw = JSON.parse(new TextDecoder('utf-8').decode(content));
    } catch {
        throw new HttpError(400, 'Uploaded file is not valid JSON.');
    }

    const parsed = geoJsonSchema.safeParse(raw);
    const holder = crsHolderSchema.safeParse(raw);
    if (!parsed.success || !holder.success) {
        throw new HttpError(400, 'Uploaded file is not a valid GeoJSON object.');
    }
    const doc = parsed.data;

    let features: GeoFeature[];
    if (doc.type === 'FeatureCollection') {
        features = doc.features.map(toFeature).filter((f): f is GeoFeature => f !== null);
    } else if (doc.type === 'Feature') {
        const feature = toFeature(doc);
        features = feature ? [feature] : [];
    } else {
        const feature: GeoFeature = { type: 'Feature', geometry: doc, properties: {} };
        features = hasCoordinates(feature) ? [feature] : [];
    }

    const layer: Layer = { type: 'FeatureCollection', features };
    return reprojectToWgs84(layer, sourceCrs(holder.data.crs));
}
