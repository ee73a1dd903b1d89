import type { GeoPoint } from '@emberline/core';

const EARTH_RADIUS_METERS = 6371000;

function toRadians(deg: number): number {
  return (deg * Math.PI) / 180;
}

/** Great-circle distance in meters. */
export function haversineDistance(a: GeoPoint, b: GeoPoint): number {
  const dLat = toRadians(b.latitude - a.latitude);
  const dLon = toRadians(b.longitude - a.longitude);
  const h =
    Math.sin(dLat / 2) * Math.sin(dLat / 2) +
    Math.cos(toRadians(a.latitude)) * Math.cos(toRadians(b.latitude)) * Math.sin(dLon / 2) * Math.sin(dLon / 2);
  return EARTH_RADIUS_METERS * 2 * Math.atan2(Math.sqrt(h), Math.sqrt(1 - h));
}

export interface BoundingBox {
  minLat: number;
  maxLat: number;
  /** One range, or two when the box crosses the antimeridian. */
  lonRanges: Array<[number, number]>;
}

/** Lat/lon box that contains every point within `radiusMeters` of `center`. */
export function boundingBox(center: GeoPoint, radiusMeters: number): BoundingBox {
  const latDelta = (radiusMeters / EARTH_RADIUS_METERS) * (180 / Math.PI);
  const minLat = center.latitude - latDelta;
  const maxLat = center.latitude + latDelta;

  // Over a pole every longitude is in reach
  const cosLat = Math.cos(toRadians(center.latitude));
  if (minLat <= -90 || maxLat >= 90 || cosLat < 1e-9) {
    return { minLat: Math.max(minLat, -90), maxLat: Math.min(maxLat, 90), lonRanges: [[-180, 180]] };
  }

  const lonDelta = latDelta / cosLat;
  if (lonDelta >= 180) {
    return { minLat, maxLat, lonRanges: [[-180, 180]] };
  }

  const minLon = center.longitude - lonDelta;
  const maxLon = center.longitude + lonDelta;
  if (minLon < -180) {
    return { minLat, maxLat, lonRanges: [[minLon + 360, 180], [-180, maxLon]] };
  }
  if (maxLon > 180) {
    return { minLat, maxLat, lonRanges: [[minLon, 180], [-180, maxLon - 360]] };
  }
  return { minLat, maxLat, lonRanges: [[minLon, maxLon]] };
}
