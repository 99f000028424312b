import type { Feature, FeatureCollection, Geometry, MultiPolygon, Polygon } from 'geojson';

// Every layer the services pass around is in EPSG:4326 and has no null geometries.
export type Layer = FeatureCollection<Geometry>;

export type GeoFeature = Feature<Geometry>;

export type PolygonalFeature = Feature<Polygon | MultiPolygon>;

export const OVERLAY_OPERATIONS = ['clip', 'difference', 'union', 'intersect', 'merge', 'dissolve'] as const;

export type OverlayOperation = (typeof OVERLAY_OPERATIONS)[number];

export interface AuthUser {
    id: string;
    email?: string;
}

export interface UtmCrs {
    epsg: number;
    zone: number;
    hemisphere: 'north' | 'south';
}

export interface HealthStatus {
    status: 'ok';
    message: string;
}
