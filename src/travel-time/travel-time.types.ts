export type Terrain = 'flat' | 'hills' | 'mountains' | 'urban';

export interface TransportClassProfile {
  id: string;
  label: string;
  /** Multiplier on the base reference speed. */
  speedFactor: number;
  /** Straight-line to track-length correction. */
  curvatureFactor: number;
  stopsPer100Km: number;
  dwellMinutes: number;
}

export interface BoundingBox {
  minLon: number;
  maxLon: number;
  minLat: number;
  maxLat: number;
}

export interface RegionBox extends BoundingBox {
  name: string;
  terrain: Terrain;
}

export interface RegionBand {
  name: string;
  terrain: Terrain;
  minLat: number;
}

export interface TravelTimeModel {
  baseSpeedKmh: number;
  defaultTerrainFactor: number;
  defaultTransportClass: string;
  terrainFactors: Record<Terrain, number>;
  transportClasses: TransportClassProfile[];
  envelope: BoundingBox;
  regions: RegionBox[];
  bands: RegionBand[];
}

export interface ResolvedRegion {
  name: string;
  terrain: Terrain;
  source: 'box' | 'band';
}

export type TravelTimeSource = 'override' | 'estimate';

export interface TravelTime {
  from: string;
  to: string;
  minutes: number;
  formatted: string;
  source: TravelTimeSource;
}
