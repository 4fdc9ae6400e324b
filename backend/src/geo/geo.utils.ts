import { Coordinates } from './geo.types';

const EARTH_RADIUS_KM = 6371;

const toRadians = (degrees: number): number => degrees * (Math.PI / 180);

/** Great-circle distance in kilometres, rounded to 2 decimals. */
export function haversineKm(from: Coordinates, to: Coordinates): number {
  const dLat = toRadians(to.latitude - from.latitude);
  const dLng = toRadians(to.longitude - from.longitude);
  const a =
    Math.sin(dLat / 2) * Math.sin(dLat / 2) +
    Math.cos(toRadians(from.latitude)) *
      Math.cos(toRadians(to.latitude)) *
      Math.sin(dLng / 2) *
      Math.sin(dLng / 2);
  const c = 2 * Math.atan2(Math.sqrt(a), Math.sqrt(1 - a));
  return Math.round(EARTH_RADIUS_KM * c * 100) / 100;
}

/**
 * Cache partition key: both axes rounded to `precision` decimals, so nearby
 * hotels (about 110 m apart at 3 decimals) share cached results.
 */
export function buildLocationKey(coordinates: Coordinates, precision: number): string {
  const round = (value: number) => {
    const fixed = value.toFixed(precision);
    // -0.000 and 0.000 are the same spot
    return Number(fixed) === 0 ? (0).toFixed(precision) : fixed;
  };
  return `${round(coordinates.latitude)},${round(coordinates.longitude)}`;
}

export const isValidCoordinates = (latitude: number, longitude: number): boolean =>
  Number.isFinite(latitude) &&
  Number.isFinite(longitude) &&
  Math.abs(latitude) <= 90 &&
  Math.abs(longitude) <= 180;
