import { ConfigService } from '@nestjs/config';

import { axiosResponse, stubAxiosInstance } from '../../common/testing/axios-stub';
import { NearbySearchRequest } from '../geo.types';
import { MapMyIndiaProvider } from './mapmyindia.provider';

const request: NearbySearchRequest = {
  origin: { latitude: 28.6315, longitude: 77.2167 },
  category: 'restaurants',
  radiusMeters: 5000,
  language: 'en',
};

describe('MapMyIndiaProvider', () => {
  let stub: ReturnType<typeof stubAxiosInstance>;
  let provider: MapMyIndiaProvider;

  beforeEach(() => {
    stub = stubAxiosInstance();
    provider = new MapMyIndiaProvider(
      new ConfigService({
        MAPMYINDIA_CLIENT_ID: 'test-client',
        MAPMYINDIA_CLIENT_SECRET: 'test-secret',
      }),
    );
    stub.post.mockResolvedValue(axiosResponse({ access_token: 'test-token', expires_in: 3600 }));
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('is disabled without client credentials', () => {
    expect(new MapMyIndiaProvider(new ConfigService({})).isEnabled()).toBe(false);
    expect(provider.isEnabled()).toBe(true);
  });

  it('normalizes nearby places and skips unusable entries', async () => {
    stub.get.mockResolvedValue(
      axiosResponse({
        suggestedLocations: [
          {
            placeName: 'Cafe Lota',
            placeAddress: 'Block A, Connaught Place',
            latitude: 28.6325,
            longitude: 77.2167,
            eLoc: 'MMI001',
          },
          { placeName: 'Saravana Bhavan', distance: 1250, eLoc: 'MMI002' },
          { placeAddress: 'nameless' },
        ],
      }),
    );

    const places = await provider.searchNearby(request);

    expect(places).toEqual([
      {
        name: 'Cafe Lota',
        rating: null,
        distanceKm: 0.11,
        address: 'Block A, Connaught Place',
        externalId: 'MMI001',
      },
      { name: 'Saravana Bhavan', rating: null, distanceKm: 1.25, address: '', externalId: 'MMI002' },
    ]);
    expect(stub.get).toHaveBeenCalledWith(
      'https://atlas.mapmyindia.com/api/places/nearby/json',
      expect.objectContaining({
        params: { keywords: 'FODCOF', refLocation: '28.6315,77.2167', radius: 5000, page: 1 },
        headers: { Authorization: 'Bearer test-token' },
      }),
    );
  });

  it('reuses the access token until it expires', async () => {
    stub.get.mockResolvedValue(axiosResponse({ suggestedLocations: [] }));

    await provider.searchNearby(request);
    await provider.searchNearby({ ...request, category: 'atms' });

    expect(stub.post).toHaveBeenCalledTimes(1);
    expect(stub.get).toHaveBeenLastCalledWith(
      expect.any(String),
      expect.objectContaining({ params: expect.objectContaining({ keywords: 'FINATM' }) }),
    );
  });

  it('fails when no token is issued', async () => {
    stub.post.mockResolvedValue(axiosResponse({}));

    await expect(provider.searchNearby(request)).rejects.toThrow(
      'MapMyIndia did not return an access token',
    );
    expect(stub.get).not.toHaveBeenCalled();
  });

  it('rejects malformed bodies', async () => {
    stub.get.mockResolvedValue(axiosResponse('<html>maintenance</html>'));

    await expect(provider.searchNearby(request)).rejects.toThrow('malformed body');
  });

  it('geocodes through copResults', async () => {
    stub.get.mockResolvedValue(
      axiosResponse({
        copResults: {
          latitude: '28.6315',
          longitude: '77.2167',
          formattedAddress: 'Connaught Place, New Delhi, Delhi',
        },
      }),
    );

    await expect(provider.geocode('Connaught Place, New Delhi')).resolves.toEqual({
      latitude: 28.6315,
      longitude: 77.2167,
      formattedAddress: 'Connaught Place, New Delhi, Delhi',
    });
  });

  it('reports no match when the geocode result has no coordinates', async () => {
    stub.get.mockResolvedValue(axiosResponse({ copResults: { formattedAddress: 'Delhi' } }));

    await expect(provider.geocode('Delhi')).resolves.toBeNull();
  });
});
