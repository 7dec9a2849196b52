import { NetworkStore } from '../network/network-store';
import type { NetworkState, PairValue } from '../network/network.types';
import { compileCatalogSchema, type CatalogValidator } from '../shared/catalog-file';
import {
  fail,
  isFailure,
  succeed,
  type OperationResult,
} from '../shared/operation-result';

export const NETWORK_DOCUMENT_VERSION = 1;

/**
 * Persisted form of a network. Pair-keyed maps are lists of explicit
 * `{ from, to, value }` entries, so city names may contain any character.
 */
export interface NetworkDocument {
  version?: number;
  cities: Record<string, [number, number]>;
  connections: Array<[string, string]>;
  train_types?: PairValue<string>[];
  travel_times?: PairValue<number>[];
  daybreaks?: PairValue<boolean>[];
  route_chain_names?: Record<string, string>;
  zoomed_states?: unknown[];
}

let validateDocument: CatalogValidator<NetworkDocument> | null = null;

function documentValidator(): CatalogValidator<NetworkDocument> {
  if (!validateDocument) {
    validateDocument = compileCatalogSchema<NetworkDocument>(
      'network-document.schema.json',
    );
  }
  return validateDocument;
}

export function toNetworkDocument(state: NetworkState): NetworkDocument {
  return {
    version: NETWORK_DOCUMENT_VERSION,
    cities: Object.fromEntries(
      state.cities.map((city): [string, [number, number]] => [
        city.name,
        [city.coordinate.lon, city.coordinate.lat],
      ]),
    ),
    connections: state.connections.map((pair): [string, string] => [pair.from, pair.to]),
    train_types: state.transportClasses.map((entry) => ({ ...entry })),
    travel_times: state.durationOverrides.map((entry) => ({ ...entry })),
    daybreaks: state.dayBreaks.map((pair) => ({ ...pair, value: true })),
    route_chain_names: Object.fromEntries(
      state.chainNames.map((entry): [string, string] => [String(entry.index), entry.name]),
    ),
    zoomed_states: structuredClone(state.zoomedStates),
  };
}

/**
 * Validates a document against the schema and the network invariants and
 * returns the state it describes.
 */
export function parseNetworkDocument(
  input: unknown,
  transportClasses: readonly string[],
): OperationResult<NetworkState> {
  const checked = documentValidator()(input);
  if (!checked.valid) {
    return fail('invalid_input', `Network document is invalid: ${checked.errors.join('; ')}`);
  }
  const document = checked.value;
  const store = new NetworkStore({ transportClasses });

  Object.entries(document.cities).forEach(([name, [lon, lat]]) => {
    store.addCity(name, { lon, lat });
  });

  const steps: Array<() => OperationResult<unknown>> = [
    ...document.connections.map(([from, to]) => () => {
      const result = store.addConnection(from, to);
      return result.status === 'not_found'
        ? fail('invalid_input', `Connection ${from} - ${to}: ${result.message}`)
        : result;
    }),
    ...(document.train_types ?? []).map((entry) => () =>
      store.hasConnection(entry.from, entry.to)
        ? store.setTransportClass(entry.from, entry.to, entry.value)
        : fail('invalid_input', `train_types names unknown connection ${entry.from} - ${entry.to}.`),
    ),
    ...(document.travel_times ?? []).map((entry) => () =>
      store.setDurationOverride(entry.from, entry.to, entry.value),
    ),
    ...(document.daybreaks ?? [])
      .filter((entry) => entry.value)
      .map((entry) => () => store.markBreak(entry.from, entry.to)),
    ...Object.entries(document.route_chain_names ?? {}).map(([index, name]) => () =>
      store.setChainName(Number.parseInt(index, 10), name),
    ),
  ];

  for (const step of steps) {
    const result = step();
    if (isFailure(result)) {
      return result;
    }
  }

  return succeed(
    { ...store.snapshot(), zoomedStates: structuredClone(document.zoomed_states ?? []) },
    'Network document loaded.',
  );
}
