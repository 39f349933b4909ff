import fetch from 'node-fetch';
import { z } from 'zod';
import { AppConfig } from '../config';
import { GeoResult } from '../types';

const GEOCODE_TIMEOUT_MS = 15_000;
const CANDIDATE_LIMIT = 3;

export const FALLBACK_LATITUDE = -6.2;
export const FALLBACK_LONGITUDE = 106.8;

const candidateSchema = z.object({
  display_name: z.string().optional(),
  lat: z.union([z.string(), z.number()]).optional(),
  lon: z.union([z.string(), z.number()]).optional(),
  address: z.record(z.string(), z.string()).catch({}),
  osm_id: z.union([z.number(), z.string()]).optional(),
});

const searchResponseSchema = z.array(candidateSchema);

function toCoordinate(value: string | number | undefined): number {
  if (value === undefined) return 0;
  const n = typeof value === 'number' ? value : parseFloat(value);
  return Number.isFinite(n) ? n : 0;
}

export function buildSearchUrl(config: AppConfig, address: string): string {
  const params = new URLSearchParams({
    q: `${address}, Indonesia`,
    format: 'jsonv2',
    addressdetails: '1',
    limit: String(CANDIDATE_LIMIT),
    viewbox: config.boundingBox,
    bounded: '1',
  });
  return `${config.nominatimUrl}?${params.toString()}`;
}

/**
 * Resolves an address inside the Jabodetabek bounding box. The provider's
 * first candidate is taken as the best match. Returns null when nothing
 * matched or the lookup failed.
 */
export async function geocodeAddress(
  config: AppConfig,
  address: string,
): Promise<GeoResult | null> {
  try {
    const res = await fetch(buildSearchUrl(config, address), {
      headers: { 'User-Agent': config.userAgent },
      timeout: GEOCODE_TIMEOUT_MS,
    });

    if (!res.ok) {
      const text = await res.text();
      throw new Error(`Nominatim API error: ${res.status} ${text}`);
    }

    const parsed = searchResponseSchema.safeParse(await res.json());
    if (!parsed.success) {
      throw new Error('Nominatim API returned an unexpected payload.');
    }

    const candidates = parsed.data;
    const best = candidates[0];
    if (!best) return null;

    return {
      displayName: best.display_name ?? '',
      latitude: toCoordinate(best.lat),
      longitude: toCoordinate(best.lon),
      addressComponents: best.address,
      source: 'nominatim',
      osmId: best.osm_id,
      confidence: candidates.length,
    };
  } catch (err) {
    console.warn('⚠️ Geocoding error:', err instanceof Error ? err.message : err);
    return null;
  }
}

export function fallbackGeoResult(address: string): GeoResult {
  return {
    displayName: `Area ${address} (estimasi)`,
    latitude: FALLBACK_LATITUDE,
    longitude: FALLBACK_LONGITUDE,
    addressComponents: {},
    source: 'fallback',
    confidence: 0,
  };
}
