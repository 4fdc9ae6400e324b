import { Place } from '@guest-concierge/shared-types';

import { rankPlaces } from './place-ranking';

const place = (name: string, distanceKm: number, rating: number | null): Place => ({
  name,
  distanceKm,
  rating,
  address: '',
  externalId: name,
});

describe('rankPlaces', () => {
  it('orders by distance, then rating with unrated last, then name', () => {
    const ranked = rankPlaces(
      [
        place('Far', 3.2, 5),
        place('Unrated', 0.5, null),
        place('Bravo', 0.5, 4.1),
        place('Alpha', 0.5, 4.1),
        place('Best', 0.5, 4.8),
        place('Nearest', 0.2, 2),
      ],
      10,
    );

    expect(ranked.map(({ name }) => name)).toEqual([
      'Nearest',
      'Best',
      'Alpha',
      'Bravo',
      'Unrated',
      'Far',
    ]);
  });

  it('caps the list without mutating the input', () => {
    const input = [place('B', 2, null), place('A', 1, null), place('C', 3, null)];

    expect(rankPlaces(input, 2).map(({ name }) => name)).toEqual(['A', 'B']);
    expect(input.map(({ name }) => name)).toEqual(['B', 'A', 'C']);
  });
});
