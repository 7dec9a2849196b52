import type { Coordinate } from '../network/network.types';
import type {
  BoundingBox,
  RegionBand,
  RegionBox,
  ResolvedRegion,
} from './travel-time.types';

const contains = (box: BoundingBox, point: Coordinate): boolean =>
  point.lon >= box.minLon &&
  point.lon < box.maxLon &&
  point.lat >= box.minLat &&
  point.lat < box.maxLat;

const overlaps = (a: BoundingBox, b: BoundingBox): boolean =>
  a.minLon < b.maxLon && b.minLon < a.maxLon && a.minLat < b.maxLat && b.minLat < a.maxLat;

/**
 * Maps a coordinate to a named region. Boxes must be disjoint; a shared edge
 * belongs to the box whose minimum it is. Inside the envelope an unmatched
 * point falls into the first latitude band whose `minLat` it reaches.
 */
export class RegionClassifier {
  constructor(
    private readonly regions: readonly RegionBox[],
    private readonly bands: readonly RegionBand[],
    private readonly envelope: BoundingBox,
  ) {
    regions.forEach((region, index) => {
      const clash = regions.slice(index + 1).find((other) => overlaps(region, other));
      if (clash) {
        throw new Error(`Region boxes ${region.name} and ${clash.name} overlap`);
      }
    });
  }

  resolve(point: Coordinate): ResolvedRegion | null {
    const region = this.regions.find((candidate) => contains(candidate, point));
    if (region) {
      return { name: region.name, terrain: region.terrain, source: 'box' };
    }
    if (!contains(this.envelope, point)) {
      return null;
    }
    const band = this.bands.find((candidate) => point.lat >= candidate.minLat);
    return band ? { name: band.name, terrain: band.terrain, source: 'band' } : null;
  }
}
