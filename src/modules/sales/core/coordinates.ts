import { parseDecimalLiteral } from './numbers.js';

export type LatLon = readonly [latitude: number, longitude: number];

export type MaybeLatLon = LatLon | readonly [null, null];

const NO_COORDINATES: readonly [null, null] = [null, null];

const pair = (first: string | undefined, second: string | undefined): LatLon | null => {
  if (first === undefined || second === undefined) return null;

  const lat = parseDecimalLiteral(first);
  const lon = parseDecimalLiteral(second);
  return lat !== null && lon !== null ? [lat, lon] : null;
};

/**
 * Extracts a coordinate pair from a "lat,lon" or "lat lon" field.
 * Returns `[null, null]` unless both values parse.
 */
export const extractLatLon = (value: unknown): MaybeLatLon => {
  if (typeof value !== 'string' || value.trim() === '') return NO_COORDINATES;

  const commaParts = value.split(',');
  if (commaParts.length === 2) {
    const byComma = pair(commaParts[0], commaParts[1]);
    if (byComma !== null) return byComma;
  }

  const tokens = value.trim().split(/\s+/);
  if (tokens.length >= 2) {
    return pair(tokens[0], tokens[1]) ?? NO_COORDINATES;
  }

  return NO_COORDINATES;
};
