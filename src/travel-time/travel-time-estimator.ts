import type { Coordinate } from '../network/network.types';
import { loadCatalogFile } from '../shared/catalog-file';
import { haversineKm } from './geo';
import { RegionClassifier } from './region-classifier';
import type {
  TransportClassProfile,
  TravelTimeModel,
} from './travel-time.types';

export const TRAVEL_TIME_MODEL_FILE = 'travel-time/model.yaml';

export function loadTravelTimeModel(override?: string): TravelTimeModel {
  return loadCatalogFile<TravelTimeModel>(
    TRAVEL_TIME_MODEL_FILE,
    'travel-time-model.schema.json',
    override,
  );
}

export interface TravelTimeBreakdown {
  distanceKm: number;
  adjustedDistanceKm: number;
  terrainFactor: number;
  effectiveSpeedKmh: number;
  baseMinutes: number;
  stops: number;
  dwellMinutes: number;
  minutes: number;
}

export class TravelTimeEstimator {
  private readonly classifier: RegionClassifier;
  private readonly profiles: Map<string, TransportClassProfile>;

  constructor(private readonly model: TravelTimeModel) {
    this.classifier = new RegionClassifier(model.regions, model.bands, model.envelope);
    this.profiles = new Map(model.transportClasses.map((profile) => [profile.id, profile]));
    if (!this.profiles.has(model.defaultTransportClass)) {
      throw new Error(
        `Default transport class ${model.defaultTransportClass} is not defined`,
      );
    }
  }

  get defaultTransportClass(): string {
    return this.model.defaultTransportClass;
  }

  listTransportClasses(): TransportClassProfile[] {
    return this.model.transportClasses.map((profile) => ({ ...profile }));
  }

  estimate(a: Coordinate, b: Coordinate, transportClass?: string | null): number {
    return this.explain(a, b, transportClass).minutes;
  }

  explain(
    a: Coordinate,
    b: Coordinate,
    transportClass?: string | null,
  ): TravelTimeBreakdown {
    const profile = this.profile(transportClass ?? this.model.defaultTransportClass);
    const distanceKm = haversineKm(a, b);
    const adjustedDistanceKm = distanceKm * profile.curvatureFactor;
    const terrainFactor = this.terrainFactor(a, b);
    const effectiveSpeedKmh =
      (this.model.baseSpeedKmh * profile.speedFactor) / terrainFactor;
    const baseMinutes = (adjustedDistanceKm / effectiveSpeedKmh) * 60;
    const stops = Math.max(0, Math.round((distanceKm / 100) * profile.stopsPer100Km));
    const dwellMinutes = stops * profile.dwellMinutes;
    return {
      distanceKm,
      adjustedDistanceKm,
      terrainFactor,
      effectiveSpeedKmh,
      baseMinutes,
      stops,
      dwellMinutes,
      minutes: Math.floor(baseMinutes + dwellMinutes),
    };
  }

  /**
   * The more severe of both endpoint terrains. An endpoint outside every
   * region counts with the default factor.
   */
  terrainFactor(a: Coordinate, b: Coordinate): number {
    return Math.max(this.pointTerrainFactor(a), this.pointTerrainFactor(b));
  }

  private pointTerrainFactor(point: Coordinate): number {
    const region = this.classifier.resolve(point);
    return region
      ? this.model.terrainFactors[region.terrain]
      : this.model.defaultTerrainFactor;
  }

  private profile(id: string): TransportClassProfile {
    const profile = this.profiles.get(id);
    if (!profile) {
      throw new Error(`Unknown transport class ${id}`);
    }
    return profile;
  }
}
