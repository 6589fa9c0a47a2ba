/** Geographic point in decimal degrees. */
export interface GeoPoint {
  readonly lat: number;
  readonly lng: number;
}

export const LATITUDE_RANGE = { min: -90, max: 90 } as const;
export const LONGITUDE_RANGE = { min: -180, max: 180 } as const;

/** Microdegree scale used by raw trip exports. */
export const MICRODEGREES_PER_DEGREE = 1_000_000;
