import type { ConnectionPair } from '../network/network.types';
import { formatTravelMinutes } from '../travel-time/travel-time.format';
import { chainCities, type Chain } from './chain-decomposer';

export interface ChainLeg extends ConnectionPair {
  minutes: number | null;
  formatted: string;
}

export interface ChainSummary {
  index: number;
  name: string;
  cities: string[];
  legs: ChainLeg[];
  totalMinutes: number;
  formattedTotal: string;
}

export function defaultChainName(index: number): string {
  return `Route ${index + 1}`;
}

/**
 * Legend data per chain. Legs without a travel time count as zero towards the
 * total and are shown as "N/A".
 */
export function summarizeChains(
  chains: readonly Chain[],
  names: ReadonlyMap<number, string>,
  minutesFor: (pair: ConnectionPair) => number | null,
): ChainSummary[] {
  return chains.map((chain, index) => {
    const legs = chain.map((pair) => {
      const minutes = minutesFor(pair);
      return {
        from: pair.from,
        to: pair.to,
        minutes,
        formatted: minutes === null ? 'N/A' : formatTravelMinutes(minutes),
      };
    });
    const totalMinutes = legs.reduce((sum, leg) => sum + (leg.minutes ?? 0), 0);
    return {
      index,
      name: names.get(index) ?? defaultChainName(index),
      cities: chainCities(chain),
      legs,
      totalMinutes,
      formattedTotal: formatTravelMinutes(totalMinutes),
    };
  });
}
