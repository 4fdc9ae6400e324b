import { Module } from '@nestjs/common';

import { PLACE_PROVIDERS, PlaceProvider } from './geo.types';
import { GeocoderService } from './geocoder.service';
import { GooglePlacesProvider } from './providers/google-places.provider';
import { MapMyIndiaProvider } from './providers/mapmyindia.provider';
import { NominatimProvider } from './providers/nominatim.provider';

@Module({
  providers: [
    MapMyIndiaProvider,
    GooglePlacesProvider,
    NominatimProvider,
    {
      provide: PLACE_PROVIDERS,
      inject: [MapMyIndiaProvider, GooglePlacesProvider, NominatimProvider],
      useFactory: (...providers: PlaceProvider[]): PlaceProvider[] => providers,
    },
    GeocoderService,
  ],
  exports: [GeocoderService, PLACE_PROVIDERS],
})
export class GeoModule {}
