import type { ConnectionPair } from './network.types';

export type ConnectionKey = string;

/**
 * Order-independent key for a city pair. The JSON encoding keeps names with
 * commas, quotes or parentheses unambiguous.
 */
export function connectionKey(a: string, b: string): ConnectionKey {
  return a <= b ? JSON.stringify([a, b]) : JSON.stringify([b, a]);
}

export function otherEndpoint(pair: ConnectionPair, city: string): string {
  return pair.from === city ? pair.to : pair.from;
}

export function touches(pair: ConnectionPair, city: string): boolean {
  return pair.from === city || pair.to === city;
}
