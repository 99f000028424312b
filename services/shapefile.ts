// services/shapefile.ts
import JSZip from 'jszip';
import { read as readShapefile } from 'shapefile';
import { HttpError } from '../server/errors';
import type { Layer } from '../types';
import { reprojectToWgs84, WGS84 } from './crs';

const ZIP_SIGNATURE = [0x50, 0x4b, 0x03, 0x04];

const DEFAULT_DBF_ENCODING = 'windows-1252';

export function isZip(content: Uint8Array): boolean {
    return ZIP_SIGNATURE.every((byte, i) => content[i] === byte);
}

/**
 * Maps the code page written in a .cpg (GDAL and ArcGIS write forms such as
 * `1252`, `ANSI 1252`, `65001` or `8859_1`) to a WHATWG encoding label.
 */
export function dbfEncoding(cpg: string): string {
    const text = cpg.trim().toUpperCase();
    if (!text) return DEFAULT_DBF_ENCODING;
    if (/^(65001|UTF-?8)$/.test(text)) return 'utf-8';

    const windows = /^(?:ANSI\s*|CP\s*|WINDOWS-?)?(125[0-8])$/.exec(text);
    if (windows) return `windows-${windows[1]}`;
    const iso = /^(?:ISO[-_ ]?)?8859[-_]?(\d{1,2})$/.exec(text);
    if (iso) return `iso-8859-${iso[1]}`;

    try {
        return new TextDecoder(text).encoding;
    } catch {
        console.warn(`[Shapefile] Unknown .cpg code page '${cpg.trim()}', reading attributes as ${DEFAULT_DBF_ENCODING}`);
        return DEFAULT_DBF_ENCODING;
    }
}

async function loadZip(content: Uint8Array): Promise<JSZip> {
    try {
        return await JSZip.loadAsync(content);
    } catch {
        throw new HttpError(400, 'Uploaded file is not a valid zip archive.');
    }
}

/**
 * Reads the first shapefile found in a zip archive, entirely in memory.
 * The .dbf, .prj and .cpg next to the .shp are picked up when present; without
 * a .prj the coordinates are taken to be EPSG:4326 already.
 */
export async function readZipShapefile(content: Uint8Array): Promise<Layer> {
    const zip = await loadZip(content);

    const entries = Object.values(zip.files)
        .filter((entry) => !entry.dir && !entry.name.startsWith('__MACOSX/'))
        .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

    const shpEntry = entries.find((entry) => entry.name.toLowerCase().endsWith('.shp'));
    if (!shpEntry) {
        throw new HttpError(400, 'No .shp file found in the zip archive.');
    }

    const base = shpEntry.name.slice(0, -'.shp'.length).toLowerCase();
    const sibling = (ext: string) => entries.find((entry) => entry.name.toLowerCase() === base + ext);
    const dbfEntry = sibling('.dbf');
    const prjEntry = sibling('.prj');
    const cpgEntry = sibling('.cpg');

    const shp = await shpEntry.async('uint8array');
    const dbf = dbfEntry ? await dbfEntry.async('uint8array') : undefined;
    const prj = prjEntry ? (await prjEntry.async('string')).trim() : '';
    const encoding = cpgEntry ? dbfEncoding(await cpgEntry.async('string')) : DEFAULT_DBF_ENCODING;

    let layer: Layer;
    try {
        const collection = await readShapefile(shp, dbf, { encoding });
        // Null shapes come back as features with a null geometry.
        layer = {
            type: 'FeatureCollection',
            features: collection.features.filter((feature) => feature.geometry != null),
        };
    } catch (e) {
        const reason = e instanceof Error ? e.message : String(e);
        throw new HttpError(400, `Could not read shapefile ${shpEntry.name}: ${reason}`);
    }
    return reprojectToWgs84(layer, prj || WGS84);
}
