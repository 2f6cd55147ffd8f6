/**
 * A resolved position handed to the tracker. Coordinates in decimal degrees.
 */
export interface LocationFix {
  latitude: number;
  longitude: number;
  speedKmh: number;
  headingDeg: number;
  /** Horizontal accuracy in meters. */
  accuracy: number;
  timestamp: Date;
  isValid: boolean;
  satellites?: number;
}

export interface LocationSource {
  getCurrentPosition(): Promise<LocationFix | null>;
}

export const LOCATION_SOURCE = Symbol('LOCATION_SOURCE');

/**
 * `isValid=false` and (0, 0) both mean "no fix".
 */
export function isUsableFix(fix: LocationFix | null | undefined): fix is LocationFix {
  if (!fix || !fix.isValid) {
    return false;
  }
  if (!Number.isFinite(fix.latitude) || !Number.isFinite(fix.longitude)) {
    return false;
  }
  return !(fix.latitude === 0 && fix.longitude === 0);
}
