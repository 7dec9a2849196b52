import {
  fail,
  succeed,
  type OperationResult,
} from '../shared/operation-result';
import {
  connectionKey,
  otherEndpoint,
  touches,
  type ConnectionKey,
} from './connection-key';
import type {
  City,
  ConnectionAttributes,
  ConnectionPair,
  ConnectionView,
  Coordinate,
  NetworkChange,
  NetworkChangeListener,
  NetworkState,
  TransportClassId,
} from './network.types';

export interface NetworkStoreOptions {
  /** Transport classes accepted by `addConnection` and `setTransportClass`. */
  transportClasses: readonly TransportClassId[];
}

/**
 * Authoritative city and connection sets of one workspace. Expected domain
 * failures are returned as results; nothing here throws for bad input.
 */
export class NetworkStore {
  private readonly cities = new Map<string, Coordinate>();
  private readonly connections = new Map<ConnectionKey, ConnectionPair>();
  private readonly transportClasses = new Map<ConnectionKey, TransportClassId>();
  private readonly durationOverrides = new Map<ConnectionKey, number>();
  private readonly dayBreaks = new Map<ConnectionKey, ConnectionPair>();
  private readonly chainNames = new Map<number, string>();
  private zoomedStates: unknown[] = [];
  private readonly listeners = new Set<NetworkChangeListener>();
  private readonly knownClasses: ReadonlySet<TransportClassId>;

  constructor(options: NetworkStoreOptions) {
    this.knownClasses = new Set(options.transportClasses);
  }

  onChange(listener: NetworkChangeListener): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  // --- readers -------------------------------------------------------------

  listCities(): City[] {
    return Array.from(this.cities.entries()).map(([name, coordinate]) => ({
      name,
      coordinate: { ...coordinate },
    }));
  }

  getCity(name: string): City | null {
    const coordinate = this.cities.get(name);
    return coordinate ? { name, coordinate: { ...coordinate } } : null;
  }

  hasCity(name: string): boolean {
    return this.cities.has(name);
  }

  listConnections(): ConnectionPair[] {
    return Array.from(this.connections.values()).map((pair) => ({ ...pair }));
  }

  listConnectionViews(): ConnectionView[] {
    return this.listConnections().map((pair) => ({
      ...pair,
      ...this.getConnectionAttributes(pair.from, pair.to),
    }));
  }

  hasConnection(a: string, b: string): boolean {
    return this.connections.has(connectionKey(a, b));
  }

  getConnectionAttributes(a: string, b: string): ConnectionAttributes {
    const key = connectionKey(a, b);
    return {
      transportClass: this.transportClasses.get(key) ?? null,
      durationOverrideMinutes: this.durationOverrides.get(key) ?? null,
      dayBreak: this.dayBreaks.has(key),
    };
  }

  isBreak(a: string, b: string): boolean {
    return this.dayBreaks.has(connectionKey(a, b));
  }

  listBreakMarkers(): ConnectionPair[] {
    return Array.from(this.dayBreaks.values()).map((pair) => ({ ...pair }));
  }

  getChainNames(): Map<number, string> {
    return new Map(this.chainNames);
  }

  // --- cities --------------------------------------------------------------

  addCity(name: string, coordinate: Coordinate): OperationResult<City> {
    const existed = this.cities.has(name);
    this.cities.set(name, { lon: coordinate.lon, lat: coordinate.lat });
    if (existed) {
      this.emit({ kind: 'city-updated', city: name });
    }
    return succeed(
      { name, coordinate: { ...coordinate } },
      existed ? `City ${name} updated.` : `City ${name} added.`,
    );
  }

  updateCityCoordinates(
    name: string,
    coordinate: Coordinate,
  ): OperationResult<City> {
    if (!this.cities.has(name)) {
      return fail('not_found', `City ${name} does not exist.`);
    }
    return this.addCity(name, coordinate);
  }

  /**
   * Removes every listed city that exists, with the connections touching it.
   * Unlike `removeCity`, former neighbours are not joined.
   */
  removeCities(
    names: readonly string[],
  ): OperationResult<{ cities: string[]; removed: ConnectionPair[] }> {
    const present = Array.from(new Set(names)).filter((name) => this.cities.has(name));
    if (!present.length) {
      return fail('not_found', 'None of these cities exist.');
    }
    const doomed = new Set(present);
    const removed = this.listConnections().filter(
      (pair) => doomed.has(pair.from) || doomed.has(pair.to),
    );
    removed.forEach((pair) => this.dropConnection(pair));
    present.forEach((name) => {
      this.cities.delete(name);
      this.emit({ kind: 'city-removed', city: name });
    });
    return succeed(
      { cities: present, removed },
      `Removed cities ${present.join(', ')}.`,
    );
  }

  /**
   * Removes a city and its connections, then joins every pair of its former
   * neighbours that is not already connected.
   */
  removeCity(
    name: string,
  ): OperationResult<{ removed: ConnectionPair[]; added: ConnectionPair[] }> {
    if (!this.cities.has(name)) {
      return fail('not_found', `City ${name} does not exist.`);
    }

    const incident = this.listConnections().filter((pair) => touches(pair, name));
    const neighbours = incident.map((pair) => otherEndpoint(pair, name));

    this.cities.delete(name);
    incident.forEach((pair) => this.dropConnection(pair));
    this.emit({ kind: 'city-removed', city: name });

    const added: ConnectionPair[] = [];
    for (let i = 0; i < neighbours.length; i += 1) {
      for (let j = i + 1; j < neighbours.length; j += 1) {
        const from = neighbours[i];
        const to = neighbours[j];
        if (from === to || this.hasConnection(from, to)) {
          continue;
        }
        const pair = { from, to };
        this.connections.set(connectionKey(from, to), pair);
        this.emit({ kind: 'connection-added', pair });
        added.push({ ...pair });
      }
    }

    return succeed(
      { removed: incident, added },
      `City ${name} and its connections removed.`,
    );
  }

  // --- connections ---------------------------------------------------------

  addConnection(
    a: string,
    b: string,
    transportClass?: TransportClassId | null,
  ): OperationResult<ConnectionPair> {
    if (a === b) {
      return fail('invalid_input', 'A city cannot be connected to itself.');
    }
    const missing = [a, b].find((city) => !this.cities.has(city));
    if (missing !== undefined) {
      return fail('not_found', `City ${missing} does not exist.`);
    }
    const key = connectionKey(a, b);
    if (this.connections.has(key)) {
      return fail('duplicate', 'This connection already exists.');
    }
    if (transportClass && !this.knownClasses.has(transportClass)) {
      return fail('invalid_input', `Unknown transport class ${transportClass}.`);
    }

    const pair = { from: a, to: b };
    this.connections.set(key, pair);
    if (transportClass) {
      this.transportClasses.set(key, transportClass);
    }
    this.emit({ kind: 'connection-added', pair });
    return succeed({ ...pair }, `Connection added between ${a} and ${b}.`);
  }

  removeConnection(a: string, b: string): OperationResult<ConnectionPair> {
    const pair = this.connections.get(connectionKey(a, b));
    if (!pair) {
      return fail('not_found', `No connection between ${a} and ${b}.`);
    }
    this.dropConnection(pair);
    return succeed({ ...pair }, `Connection between ${a} and ${b} removed.`);
  }

  /**
   * Replaces the connection set. Pairs already present in the new list are
   * skipped; attributes of pairs that survive are kept.
   */
  replaceConnections(pairs: readonly ConnectionPair[]): {
    applied: ConnectionPair[];
    skipped: ConnectionPair[];
  } {
    const previous = this.listConnections();
    this.connections.clear();
    const applied: ConnectionPair[] = [];
    const skipped: ConnectionPair[] = [];
    pairs.forEach((pair) => {
      const key = connectionKey(pair.from, pair.to);
      if (
        pair.from === pair.to ||
        this.connections.has(key) ||
        !this.cities.has(pair.from) ||
        !this.cities.has(pair.to)
      ) {
        skipped.push({ ...pair });
        return;
      }
      this.connections.set(key, { from: pair.from, to: pair.to });
      applied.push({ ...pair });
    });

    previous.forEach((pair) => {
      const key = connectionKey(pair.from, pair.to);
      if (!this.connections.has(key)) {
        this.transportClasses.delete(key);
        this.durationOverrides.delete(key);
        this.dayBreaks.delete(key);
      }
    });
    this.emit({ kind: 'restored' });
    return { applied, skipped };
  }

  setTransportClass(
    a: string,
    b: string,
    transportClass: TransportClassId,
  ): OperationResult<ConnectionPair> {
    const pair = this.connections.get(connectionKey(a, b));
    if (!pair) {
      return fail('not_found', `No connection between ${a} and ${b}.`);
    }
    if (!this.knownClasses.has(transportClass)) {
      return fail('invalid_input', `Unknown transport class ${transportClass}.`);
    }
    this.transportClasses.set(connectionKey(a, b), transportClass);
    this.emit({ kind: 'connection-attributes-changed', pair });
    return succeed(
      { ...pair },
      `Transport class of ${a} - ${b} set to ${transportClass}.`,
    );
  }

  // Break markers are not tied to an existing connection.
  markBreak(a: string, b: string): OperationResult<ConnectionPair> {
    const key = connectionKey(a, b);
    const pair = this.connections.get(key) ?? { from: a, to: b };
    this.dayBreaks.set(key, { ...pair });
    return succeed({ ...pair }, `Daybreak set on ${a} - ${b}.`);
  }

  unmarkBreak(a: string, b: string): OperationResult<ConnectionPair> {
    this.dayBreaks.delete(connectionKey(a, b));
    return succeed({ from: a, to: b }, `Daybreak cleared on ${a} - ${b}.`);
  }

  setDurationOverride(
    a: string,
    b: string,
    minutes: number,
  ): OperationResult<ConnectionPair> {
    if (!Number.isInteger(minutes) || minutes <= 0) {
      return fail('invalid_input', 'Travel time must be a positive number of minutes.');
    }
    const pair = this.connections.get(connectionKey(a, b));
    if (!pair) {
      return fail('invalid_input', `No connection between ${a} and ${b}.`);
    }
    this.durationOverrides.set(connectionKey(a, b), minutes);
    this.emit({ kind: 'connection-attributes-changed', pair });
    return succeed({ ...pair }, `Travel time of ${a} - ${b} set to ${minutes} min.`);
  }

  clearDurationOverride(a: string, b: string): OperationResult<ConnectionPair> {
    const key = connectionKey(a, b);
    const pair = this.connections.get(key) ?? { from: a, to: b };
    if (this.durationOverrides.delete(key)) {
      this.emit({ kind: 'connection-attributes-changed', pair });
    }
    return succeed({ ...pair }, `Travel time of ${a} - ${b} cleared.`);
  }

  // --- chain names ---------------------------------------------------------

  setChainName(index: number, name: string): OperationResult<string> {
    const trimmed = name.trim();
    if (!Number.isInteger(index) || index < 0) {
      return fail('invalid_input', 'Chain index must be a non-negative integer.');
    }
    if (!trimmed) {
      return fail('invalid_input', 'Chain name must not be empty.');
    }
    this.chainNames.set(index, trimmed);
    return succeed(trimmed, `Route ${index + 1} renamed to ${trimmed}.`);
  }

  clearChainName(index: number): OperationResult<void> {
    this.chainNames.delete(index);
    return succeed(undefined, `Name of route ${index + 1} cleared.`);
  }

  // --- snapshots -----------------------------------------------------------

  snapshot(): NetworkState {
    const pairValues = <T>(source: Map<ConnectionKey, T>) =>
      Array.from(source.entries()).flatMap(([key, value]) => {
        const pair = this.connections.get(key);
        return pair ? [{ from: pair.from, to: pair.to, value }] : [];
      });
    return {
      cities: this.listCities(),
      connections: this.listConnections(),
      transportClasses: pairValues(this.transportClasses),
      durationOverrides: pairValues(this.durationOverrides),
      dayBreaks: this.listBreakMarkers(),
      chainNames: Array.from(this.chainNames.entries()).map(([index, name]) => ({
        index,
        name,
      })),
      zoomedStates: structuredClone(this.zoomedStates),
    };
  }

  restore(state: NetworkState): void {
    this.cities.clear();
    this.connections.clear();
    this.transportClasses.clear();
    this.durationOverrides.clear();
    this.dayBreaks.clear();
    this.chainNames.clear();

    state.cities.forEach((city) =>
      this.cities.set(city.name, { ...city.coordinate }),
    );
    state.connections.forEach((pair) =>
      this.connections.set(connectionKey(pair.from, pair.to), { ...pair }),
    );
    state.transportClasses.forEach((entry) =>
      this.transportClasses.set(connectionKey(entry.from, entry.to), entry.value),
    );
    state.durationOverrides.forEach((entry) =>
      this.durationOverrides.set(connectionKey(entry.from, entry.to), entry.value),
    );
    state.dayBreaks.forEach((pair) =>
      this.dayBreaks.set(connectionKey(pair.from, pair.to), { ...pair }),
    );
    state.chainNames.forEach((entry) => this.chainNames.set(entry.index, entry.name));
    this.zoomedStates = structuredClone(state.zoomedStates);
    this.emit({ kind: 'restored' });
  }

  private dropConnection(pair: ConnectionPair): void {
    const key = connectionKey(pair.from, pair.to);
    this.connections.delete(key);
    this.transportClasses.delete(key);
    this.durationOverrides.delete(key);
    this.dayBreaks.delete(key);
    this.emit({ kind: 'connection-removed', pair });
  }

  private emit(change: NetworkChange): void {
    this.listeners.forEach((listener) => listener(change));
  }
}
