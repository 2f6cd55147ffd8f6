import { Inject, Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { WINSTON_MODULE_NEST_PROVIDER } from 'nest-winston';
import { Observable, Subject } from 'rxjs';
import { LocationConfig } from '../../config/configuration';
import { ExtendedLoggerService } from '../logger/logger.interface';
import { isUsableFix, LocationFix, LocationSource } from './location.types';

/**
 * Latest-fix store. Fixes are pushed in through {@link update} and pulled by
 * the tracker session on every location tick. Falls back to the configured
 * fixed position when nothing was pushed yet.
 */
@Injectable()
export class LocationService implements LocationSource {
  private latest: LocationFix | null = null;
  private readonly positions = new Subject<LocationFix>();

  constructor(
    @Inject(WINSTON_MODULE_NEST_PROVIDER)
    private readonly logger: ExtendedLoggerService,
    private readonly configService: ConfigService,
  ) {}

  get positions$(): Observable<LocationFix> {
    return this.positions.asObservable();
  }

  update(fix: LocationFix): void {
    this.latest = fix;
    this.positions.next(fix);

    const { isValid } = fix;
    if (!isUsableFix(fix)) {
      this.logger.warn(`Position without fix received (valid=${isValid})`, LocationService.name);
      return;
    }

    this.logger.debug(
      `Position updated: ${fix.latitude.toFixed(6)}, ${fix.longitude.toFixed(6)} @ ${fix.speedKmh} km/h`,
      LocationService.name,
    );
  }

  getLatest(): LocationFix | null {
    return this.latest;
  }

  async getCurrentPosition(): Promise<LocationFix | null> {
    if (this.latest) {
      return this.latest;
    }
    return this.fixedPosition();
  }

  private fixedPosition(): LocationFix | null {
    const config = this.configService.get<LocationConfig>('app.location');
    if (config?.fixedLatitude === undefined || config.fixedLongitude === undefined) {
      return null;
    }

    return {
      latitude: config.fixedLatitude,
      longitude: config.fixedLongitude,
      speedKmh: 0,
      headingDeg: 0,
      accuracy: 0,
      timestamp: new Date(),
      isValid: true,
    };
  }
}
