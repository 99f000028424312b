import { area, bbox } from '@turf/turf';
import type { Geometry } from 'geojson';
import { describe, expect, it } from 'vitest';
import type { Layer } from '../types';
import { thrownBy } from '../test/helpers';
import { square } from '../test/shapefileFixture';
import { bufferLayer } from './bufferService';

function layerOf(...geometries: Geometry[]): Layer {
    return {
        type: 'FeatureCollection',
        features: geometries.map((geometry, i) => ({ type: 'Feature', geometry, properties: { index: i } })),
    };
}

describe('bufferLayer', () => {
    it('grows a polygon by the distance in metres', () => {
        const { collection } = bufferLayer(layerOf(square(0, 0, 0.01, 0.01)), 100);

        expect(collection.features).toHaveLength(1);
        const [feature] = collection.features;
        expect(feature.id).toBe('0');
        expect(feature.properties).toEqual({});
        expect(feature.geometry.type).toBe('Polygon');

        // 100 m is about 0.0009 degrees at the equator
        const [minX, minY, maxX, maxY] = bbox(feature);
        expect(minX).toBeCloseTo(-0.0009, 4);
        expect(minY).toBeCloseTo(-0.0009, 4);
        expect(maxX).toBeCloseTo(0.0109, 4);
        expect(maxY).toBeCloseTo(0.0109, 4);
    });

    it('reports the UTM zone of the layer', () => {
        const { utm } = bufferLayer(layerOf(square(106.8, -6.3, 106.9, -6.1)), 10);
        expect(utm).toEqual({ epsg: 32748, zone: 48, hemisphere: 'south' });
    });

    it('turns a point into a disc of the given radius', () => {
        const { collection } = bufferLayer(layerOf({ type: 'Point', coordinates: [106.8, -6.2] }), 50);
        const disc = area(collection.features[0]);
        // a polygonal approximation of a 50 m circle (7854 m²)
        expect(disc).toBeGreaterThan(7500);
        expect(disc).toBeLessThan(7900);
    });

    it('numbers one output feature per input feature', () => {
        const { collection } = bufferLayer(layerOf(square(0, 0, 0.01, 0.01), square(1, 1, 1.01, 1.01)), 10);
        expect(collection.features.map((f) => f.id)).toEqual(['0', '1']);
    });

    it('shrinks a polygon with a negative distance', () => {
        const { collection } = bufferLayer(layerOf(square(0, 0, 0.01, 0.01)), -100);
        const [minX, , maxX] = bbox(collection.features[0]);
        expect(minX).toBeCloseTo(0.0009, 4);
        expect(maxX).toBeCloseTo(0.0091, 4);
    });

    it('reports an empty geometry when the buffer erodes everything', () => {
        const err = thrownBy(() => bufferLayer(layerOf(square(0, 0, 0.001, 0.001)), -100));
        expect(err.status).toBe(404);
        expect(err.message).toBe('The operation resulted in an empty geometry.');
    });

    it('skips features without coordinates and buffers the rest', () => {
        const { collection, utm } = bufferLayer(
            layerOf({ type: 'Polygon', coordinates: [] }, square(106.8, -6.3, 106.9, -6.1)),
            10
        );
        expect(collection.features.map((f) => f.id)).toEqual(['0']);
        expect(utm.epsg).toBe(32748);
    });

    it('reports an empty geometry when no feature has coordinates', () => {
        const err = thrownBy(() =>
            bufferLayer(layerOf({ type: 'Polygon', coordinates: [] }, { type: 'MultiPolygon', coordinates: [] }), 100)
        );
        expect(err.status).toBe(404);
        expect(err.message).toBe('The operation resulted in an empty geometry.');
    });

    it('reports an empty geometry for an empty layer', () => {
        expect(thrownBy(() => bufferLayer(layerOf(), 100)).status).toBe(404);
    });
});
