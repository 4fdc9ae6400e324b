import { buildLocationKey, haversineKm, isValidCoordinates } from './geo.utils';

describe('geo utils', () => {
  it('rounds both axes into the location key', () => {
    expect(buildLocationKey({ latitude: 28.63149, longitude: 77.21671 }, 3)).toBe('28.631,77.217');
    expect(buildLocationKey({ latitude: 28.6315, longitude: 77.2167 }, 1)).toBe('28.6,77.2');
  });

  it('does not split the key on negative zero', () => {
    expect(buildLocationKey({ latitude: -0.0001, longitude: 0.0002 }, 3)).toBe('0.000,0.000');
  });

  it('measures great-circle distance in kilometres', () => {
    const origin = { latitude: 28.6315, longitude: 77.2167 };

    expect(haversineKm(origin, origin)).toBe(0);
    expect(haversineKm(origin, { latitude: 28.6325, longitude: 77.2167 })).toBe(0.11);
    expect(haversineKm(origin, { latitude: 19.076, longitude: 72.8777 })).toBeCloseTo(1150, -1);
  });

  it('validates coordinate ranges', () => {
    expect(isValidCoordinates(28.6, 77.2)).toBe(true);
    expect(isValidCoordinates(91, 0)).toBe(false);
    expect(isValidCoordinates(0, Number.NaN)).toBe(false);
  });
});
