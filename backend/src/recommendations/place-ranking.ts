import { Place } from '@guest-concierge/shared-types';

/**
 * Nearest first; equal distances put the better rated place first with
 * unrated places last, then order by name so the ranking is deterministic.
 */
export function comparePlaces(a: Place, b: Place): number {
  if (a.distanceKm !== b.distanceKm) {
    return a.distanceKm - b.distanceKm;
  }
  if (a.rating !== b.rating) {
    if (a.rating === null) {
      return 1;
    }
    if (b.rating === null) {
      return -1;
    }
    return b.rating - a.rating;
  }
  return a.name.localeCompare(b.name);
}

export function rankPlaces(places: readonly Place[], limit: number): Place[] {
  return [...places].sort(comparePlaces).slice(0, Math.max(0, limit));
}
