export type TransportClassId = string;

export interface Coordinate {
  /** Degrees east. */
  lon: number;
  /** Degrees north. */
  lat: number;
}

export interface City {
  name: string;
  coordinate: Coordinate;
}

/** Unordered city pair, stored in the order it was first added. */
export interface ConnectionPair {
  from: string;
  to: string;
}

export interface ConnectionAttributes {
  transportClass: TransportClassId | null;
  durationOverrideMinutes: number | null;
  dayBreak: boolean;
}

export interface ConnectionView extends ConnectionPair, ConnectionAttributes {}

export interface PairValue<T> extends ConnectionPair {
  value: T;
}

/**
 * Deep-copyable state of a network. Pair-keyed attributes are lists of
 * explicit pairs rather than string-keyed maps.
 */
export interface NetworkState {
  cities: City[];
  connections: ConnectionPair[];
  transportClasses: PairValue<TransportClassId>[];
  durationOverrides: PairValue<number>[];
  dayBreaks: ConnectionPair[];
  chainNames: Array<{ index: number; name: string }>;
  zoomedStates: unknown[];
}

export type NetworkChange =
  | { kind: 'city-updated'; city: string }
  | { kind: 'city-removed'; city: string }
  | { kind: 'connection-added'; pair: ConnectionPair }
  | { kind: 'connection-removed'; pair: ConnectionPair }
  | { kind: 'connection-attributes-changed'; pair: ConnectionPair }
  | { kind: 'restored' };

export type NetworkChangeListener = (change: NetworkChange) => void;
