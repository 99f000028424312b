// services/overlay.ts
import {
    along,
    bbox,
    booleanPointInPolygon,
    difference,
    featureCollection,
    intersect,
    length,
    lineSplit,
    lineString,
    union,
} from '@turf/turf';
import type { BBox, Feature, FeatureCollection, GeoJsonProperties, Geometry, Position } from 'geojson';
import { EMPTY_RESULT_MESSAGE, HttpError } from '../server/errors';
import { OVERLAY_OPERATIONS, type GeoFeature, type Layer, type OverlayOperation, type PolygonalFeature } from '../types';

export function isOverlayOperation(value: string): value is OverlayOperation {
    return OVERLAY_OPERATIONS.some((operation) => operation === value);
}

/** GeoJSON output with string ids "0", "1", ... in result order. */
export function numberFeatures<G extends Geometry>(features: Feature<G>[]): FeatureCollection<G> {
    return {
        type: 'FeatureCollection',
        features: features.map((feature, i) => ({ ...feature, id: String(i) })),
    };
}

const isPolygonal = (feature: GeoFeature): feature is PolygonalFeature =>
    feature.geometry.type === 'Polygon' || feature.geometry.type === 'MultiPolygon';

function requirePolygons(layer: Layer, operation: OverlayOperation): PolygonalFeature[] {
    return layer.features.map((feature) => {
        if (!isPolygonal(feature)) {
            throw new HttpError(400, `Operation '${operation}' requires polygon geometries.`);
        }
        return feature;
    });
}

function unionAll(polygons: PolygonalFeature[]): PolygonalFeature | null {
    if (polygons.length === 0) return null;
    // turf.union wants at least two geometries
    if (polygons.length === 1) {
        return { type: 'Feature', geometry: polygons[0].geometry, properties: {} };
    }
    return union(featureCollection(polygons));
}

function bboxesOverlap(a: BBox, b: BBox): boolean {
    return a[0] <= b[2] && b[0] <= a[2] && a[1] <= b[3] && b[1] <= a[3];
}

function mergeProperties(a: GeoJsonProperties, b: GeoJsonProperties): Record<string, unknown> {
    const left = a ?? {};
    const right = b ?? {};
    const merged: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(left)) {
        merged[key in right ? `${key}_1` : key] = value;
    }
    for (const [key, value] of Object.entries(right)) {
        merged[key in left ? `${key}_2` : key] = value;
    }
    return merged;
}

function clipLine(coordinates: Position[], mask: PolygonalFeature): Position[][] {
    if (coordinates.length < 2) return [];
    const pieces = lineSplit(lineString(coordinates), mask);
    return pieces.features
        .filter((piece) => {
            const middle = along(piece, length(piece) / 2);
            return booleanPointInPolygon(middle, mask);
        })
        .map((piece) => piece.geometry.coordinates);
}

function clipGeometry(geometry: Geometry, mask: PolygonalFeature): Geometry | null {
    switch (geometry.type) {
        case 'Point':
            return booleanPointInPolygon(geometry.coordinates, mask) ? geometry : null;
        case 'MultiPoint': {
            const inside = geometry.coordinates.filter((point) => booleanPointInPolygon(point, mask));
            return inside.length > 0 ? { type: 'MultiPoint', coordinates: inside } : null;
        }
        case 'LineString':
        case 'MultiLineString': {
            const lines = geometry.type === 'LineString' ? [geometry.coordinates] : geometry.coordinates;
            const kept = lines.flatMap((line) => clipLine(line, mask));
            if (kept.length === 0) return null;
            return kept.length === 1
                ? { type: 'LineString', coordinates: kept[0] }
                : { type: 'MultiLineString', coordinates: kept };
        }
        case 'Polygon':
        case 'MultiPolygon': {
            const clipped = intersect(featureCollection([{ type: 'Feature', geometry, properties: {} }, mask]));
            return clipped ? clipped.geometry : null;
        }
        case 'GeometryCollection':
            throw new HttpError(400, "Operation 'clip' does not support GeometryCollection geometries.");
    }
}

function clip(a: Layer, b: Layer): GeoFeature[] {
    const mask = unionAll(requirePolygons(b, 'clip'));
    if (!mask) return [];
    const result: GeoFeature[] = [];
    for (const feature of a.features) {
        const geometry = clipGeometry(feature.geometry, mask);
        if (geometry) result.push({ type: 'Feature', geometry, properties: feature.properties ?? {} });
    }
    return result;
}

function subtract(a: Layer, b: Layer): GeoFeature[] {
    const polygons = requirePolygons(a, 'difference');
    const mask = unionAll(requirePolygons(b, 'difference'));
    const result: GeoFeature[] = [];
    for (const feature of polygons) {
        const remainder = mask ? difference(featureCollection([feature, mask])) : feature;
        if (remainder) {
            result.push({ type: 'Feature', geometry: remainder.geometry, properties: feature.properties ?? {} });
        }
    }
    return result;
}

function unionLayers(a: Layer, b: Layer): GeoFeature[] {
    const merged = unionAll([...requirePolygons(a, 'union'), ...requirePolygons(b, 'union')]);
    return merged ? [{ type: 'Feature', geometry: merged.geometry, properties: {} }] : [];
}

function intersectLayers(a: Layer, b: Layer): GeoFeature[] {
    const left = requirePolygons(a, 'intersect').map((feature) => ({ feature, box: bbox(feature) }));
    const right = requirePolygons(b, 'intersect').map((feature) => ({ feature, box: bbox(feature) }));
    const result: GeoFeature[] = [];
    for (const l of left) {
        for (const r of right) {
            if (!bboxesOverlap(l.box, r.box)) continue;
            const overlap = intersect(featureCollection([l.feature, r.feature]));
            if (overlap) {
                result.push({
                    type: 'Feature',
                    geometry: overlap.geometry,
                    properties: mergeProperties(l.feature.properties, r.feature.properties),
                });
            }
        }
    }
    return result;
}

function mergeLayers(a: Layer, b: Layer): GeoFeature[] {
    return [...a.features, ...b.features].map((feature): GeoFeature => ({
        type: 'Feature',
        geometry: feature.geometry,
        properties: feature.properties ?? {},
    }));
}

function dissolve(a: Layer): GeoFeature[] {
    const polygons = requirePolygons(a, 'dissolve');
    const merged = unionAll(polygons);
    if (!merged) return [];
    return [{ type: 'Feature', geometry: merged.geometry, properties: polygons[0].properties ?? {} }];
}

type TwoLayerOperation = Exclude<OverlayOperation, 'dissolve'>;

const TWO_LAYER_OPERATIONS: Record<TwoLayerOperation, (a: Layer, b: Layer) => GeoFeature[]> = {
    clip,
    difference: subtract,
    union: unionLayers,
    intersect: intersectLayers,
    merge: mergeLayers,
};

export function requiresSecondLayer(operation: OverlayOperation): operation is TwoLayerOperation {
    return operation !== 'dissolve';
}

/**
 * Runs an overlay operation on layers already in EPSG:4326. Every operation
 * but dissolve needs `b`.
 */
export function runOverlay(operation: OverlayOperation, a: Layer, b?: Layer): Layer {
    let features: GeoFeature[];
    if (requiresSecondLayer(operation)) {
        if (!b) {
            throw new HttpError(400, `Operation '${operation}' requires two files.`);
        }
        features = TWO_LAYER_OPERATIONS[operation](a, b);
    } else {
        features = dissolve(a);
    }

    if (features.length === 0) {
        throw new HttpError(404, EMPTY_RESULT_MESSAGE);
    }
    return numberFeatures(features);
}
