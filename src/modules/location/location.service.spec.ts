import { ConfigService } from '@nestjs/config';
import { ExtendedLoggerService } from '../logger/logger.interface';
import { LocationService } from './location.service';
import { isUsableFix, LocationFix } from './location.types';

const stubLogger = (): ExtendedLoggerService => ({
  log: jest.fn(),
  error: jest.fn(),
  warn: jest.fn(),
  debug: jest.fn(),
  verbose: jest.fn(),
});

const fix = (overrides: Partial<LocationFix> = {}): LocationFix => ({
  latitude: -23.5505,
  longitude: -46.6333,
  speedKmh: 60,
  headingDeg: 90,
  accuracy: 5,
  timestamp: new Date(Date.UTC(2024, 2, 15, 12, 30, 45)),
  isValid: true,
  ...overrides,
});

describe('isUsableFix', () => {
  it('accepts a valid fix', () => {
    expect(isUsableFix(fix())).toBe(true);
  });

  it('rejects missing, invalid, non-finite and null-island fixes', () => {
    expect(isUsableFix(null)).toBe(false);
    expect(isUsableFix(undefined)).toBe(false);
    expect(isUsableFix(fix({ isValid: false }))).toBe(false);
    expect(isUsableFix(fix({ latitude: Number.NaN }))).toBe(false);
    expect(isUsableFix(fix({ latitude: 0, longitude: 0 }))).toBe(false);
  });
});

describe('LocationService', () => {
  it('returns null when nothing was pushed and no fixed position is configured', async () => {
    const service = new LocationService(stubLogger(), new ConfigService({ app: { location: {} } }));

    await expect(service.getCurrentPosition()).resolves.toBeNull();
    expect(service.getLatest()).toBeNull();
  });

  it('falls back to the configured fixed position', async () => {
    const service = new LocationService(
      stubLogger(),
      new ConfigService({ app: { location: { fixedLatitude: 48.8584, fixedLongitude: 2.2945 } } }),
    );

    const position = await service.getCurrentPosition();

    expect(position).toMatchObject({ latitude: 48.8584, longitude: 2.2945, speedKmh: 0, isValid: true });
  });

  it('prefers the most recently pushed fix and publishes it', async () => {
    const service = new LocationService(
      stubLogger(),
      new ConfigService({ app: { location: { fixedLatitude: 1, fixedLongitude: 1 } } }),
    );
    const seen: LocationFix[] = [];
    service.positions$.subscribe((position) => seen.push(position));

    const first = fix();
    const second = fix({ latitude: -22.9068, longitude: -43.1729 });
    service.update(first);
    service.update(second);

    await expect(service.getCurrentPosition()).resolves.toBe(second);
    expect(seen).toEqual([first, second]);
  });

  it('stores a fix without a position but warns about it', () => {
    const logger = stubLogger();
    const service = new LocationService(logger, new ConfigService({ app: { location: {} } }));

    service.update(fix({ isValid: false }));

    expect(service.getLatest()?.isValid).toBe(false);
    expect(logger.warn).toHaveBeenCalledWith('Position without fix received (valid=false)', 'LocationService');
  });
});
