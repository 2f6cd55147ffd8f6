import { Module } from '@nestjs/common';
import { LocationService } from './location.service';
import { LOCATION_SOURCE } from './location.types';

@Module({
  providers: [LocationService, { provide: LOCATION_SOURCE, useExisting: LocationService }],
  exports: [LocationService, LOCATION_SOURCE],
})
export class LocationModule {}
