import { Position } from "./schema.js";

// Mean Earth radius in kilometres.
const R = 6371;

export function haversine(lat1: number, lon1: number, lat2: number, lon2: number): number {
  const toRad = (d: number) => (d * Math.PI) / 180;
  const dLat = toRad(lat2 - lat1);
  const dLon = toRad(lon2 - lon1);
  const a =
    Math.sin(dLat / 2) ** 2 +
    Math.cos(toRad(lat1)) * Math.cos(toRad(lat2)) * Math.sin(dLon / 2) ** 2;
  return R * 2 * Math.atan2(Math.sqrt(a), Math.sqrt(1 - a));
}

/** Great-circle distance in km, or null when either end has no known position. */
export function distanceKm(a: Position | null | undefined, b: Position | null | undefined): number | null {
  if (!a || !b) return null;
  return haversine(a.lat, a.lon, b.lat, b.lon);
}
