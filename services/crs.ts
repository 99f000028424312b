// services/crs.ts
import proj4 from 'proj4';
import { clone, coordEach } from '@turf/turf';
import type { BBox } from 'geojson';
import { HttpError } from '../server/errors';
import type { Layer, UtmCrs } from '../types';

export const WGS84 = 4326;

// proj4 ships 4326 and 4269; everything else we accept is registered on first use.
const EXTRA_DEFS: Record<number, string> = {
    3857: '+proj=merc +a=6378137 +b=6378137 +lat_ts=0 +lon_0=0 +x_0=0 +y_0=0 +k=1 +units=m +nadgrids=@null +wktext +no_defs',
    900913: '+proj=merc +a=6378137 +b=6378137 +lat_ts=0 +lon_0=0 +x_0=0 +y_0=0 +k=1 +units=m +nadgrids=@null +wktext +no_defs',
    3395: '+proj=merc +lon_0=0 +k=1 +x_0=0 +y_0=0 +datum=WGS84 +units=m +no_defs',
};

const CRS_NAME_PATTERNS = [
    /^EPSG:(\d+)$/i,
    /^urn:ogc:def:crs:EPSG:[^:]*:(\d+)$/i,
    /^https?:\/\/www\.opengis\.net\/def\/crs\/EPSG\/0\/(\d+)$/i,
];

const CRS84_PATTERN = /^(urn:ogc:def:crs:OGC:[^:]*:CRS84|OGC:CRS84|CRS:84)$/i;

/**
 * Reads the EPSG code out of a CRS name as found in a GeoJSON `crs` member.
 * CRS84 is the same lon/lat axis order proj4 uses for EPSG:4326.
 */
export function parseCrsName(name: string): number | null {
    const trimmed = name.trim();
    if (CRS84_PATTERN.test(trimmed)) return WGS84;
    for (const pattern of CRS_NAME_PATTERNS) {
        const match = pattern.exec(trimmed);
        if (match) return Number(match[1]);
    }
    return null;
}

function utmDef(code: number): string | null {
    const hemisphere = Math.floor(code / 100);
    const zone = code % 100;
    if ((hemisphere !== 326 && hemisphere !== 327) || zone < 1 || zone > 60) return null;
    return `+proj=utm +zone=${zone}${hemisphere === 327 ? ' +south' : ''} +datum=WGS84 +units=m +no_defs`;
}

/** Name of a registered proj4 projection for an EPSG code. */
export function projectionFor(code: number): string {
    const name = `EPSG:${code}`;
    if (code === WGS84 || code === 4269) return name;

    const def = EXTRA_DEFS[code] ?? utmDef(code);
    if (!def) {
        throw new HttpError(400, `Unsupported CRS: ${name}`);
    }
    if (!proj4.defs(name)) {
        proj4.defs(name, def);
    }
    return name;
}

interface Converter {
    forward(coordinates: number[]): number[];
}

function converterFrom(source: number | string): Converter {
    const from = typeof source === 'number' ? projectionFor(source) : source;
    try {
        return proj4(from, projectionFor(WGS84));
    } catch (e) {
        const reason = e instanceof Error ? e.message : String(e);
        throw new HttpError(400, `Unsupported CRS definition: ${reason}`);
    }
}

/**
 * Copy of a layer with all coordinates transformed to EPSG:4326.
 * `source` is an EPSG code or a WKT string such as a shapefile's .prj.
 */
export function reprojectToWgs84(layer: Layer, source: number | string): Layer {
    if (source === WGS84) return layer;

    const converter = converterFrom(source);
    const copy = clone(layer);
    coordEach(copy, (coord) => {
        const [x, y] = converter.forward([coord[0], coord[1]]);
        if (!Number.isFinite(x) || !Number.isFinite(y)) {
            throw new HttpError(400, `Coordinate [${coord[0]}, ${coord[1]}] cannot be projected to EPSG:4326`);
        }
        coord[0] = x;
        coord[1] = y;
    });
    return copy;
}

/**
 * UTM zone holding the centre of a lon/lat bounding box, the metric CRS
 * a buffer distance is measured in.
 */
export function estimateUtmCrs(box: BBox): UtmCrs {
    const [minX, minY, maxX, maxY] = box.length === 6 ? [box[0], box[1], box[3], box[4]] : box;
    const lon = (minX + maxX) / 2;
    const lat = (minY + maxY) / 2;

    const zone = Math.min(60, Math.max(1, Math.floor((lon + 180) / 6) + 1));
    const hemisphere = lat >= 0 ? 'north' : 'south';
    return { epsg: (hemisphere === 'north' ? 32600 : 32700) + zone, zone, hemisphere };
}
