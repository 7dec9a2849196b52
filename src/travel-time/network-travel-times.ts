import { connectionKey, type ConnectionKey } from '../network/connection-key';
import type { NetworkStore } from '../network/network-store';
import type { NetworkChange } from '../network/network.types';
import {
  fail,
  succeed,
  type OperationResult,
} from '../shared/operation-result';
import type { TravelTimeEstimator } from './travel-time-estimator';
import { formatTravelMinutes } from './travel-time.format';
import type { TravelTime } from './travel-time.types';

interface CachedEstimate {
  a: string;
  b: string;
  minutes: number;
}

/**
 * Travel times of one store. Overrides are returned verbatim; estimates are
 * cached per unordered city pair and dropped whenever the store reports a
 * change to one of their inputs.
 */
export class NetworkTravelTimes {
  private readonly cache = new Map<ConnectionKey, CachedEstimate>();
  private computations = 0;
  private readonly detach: () => void;

  constructor(
    private readonly store: NetworkStore,
    private readonly estimator: TravelTimeEstimator,
  ) {
    this.detach = store.onChange((change) => this.invalidate(change));
  }

  /** Number of estimates computed since creation; cache hits do not count. */
  get computedEstimates(): number {
    return this.computations;
  }

  get cachedPairs(): number {
    return this.cache.size;
  }

  dispose(): void {
    this.detach();
    this.cache.clear();
  }

  between(a: string, b: string): OperationResult<TravelTime> {
    const cityA = this.store.getCity(a);
    const cityB = this.store.getCity(b);
    if (!cityA || !cityB) {
      return fail('not_found', `City ${cityA ? b : a} does not exist.`);
    }

    const { durationOverrideMinutes, transportClass } =
      this.store.getConnectionAttributes(a, b);
    if (durationOverrideMinutes !== null) {
      return succeed(this.toTravelTime(a, b, durationOverrideMinutes, 'override'));
    }

    const key = connectionKey(a, b);
    const cached = this.cache.get(key);
    if (cached) {
      return succeed(this.toTravelTime(a, b, cached.minutes, 'estimate'));
    }
    const minutes = this.estimator.estimate(
      cityA.coordinate,
      cityB.coordinate,
      transportClass,
    );
    this.computations += 1;
    this.cache.set(key, { a, b, minutes });
    return succeed(this.toTravelTime(a, b, minutes, 'estimate'));
  }

  private invalidate(change: NetworkChange): void {
    switch (change.kind) {
      case 'city-updated':
      case 'city-removed':
        this.cache.forEach((entry, key) => {
          if (entry.a === change.city || entry.b === change.city) {
            this.cache.delete(key);
          }
        });
        return;
      case 'connection-added':
      case 'connection-removed':
      case 'connection-attributes-changed':
        this.cache.delete(connectionKey(change.pair.from, change.pair.to));
        return;
      case 'restored':
        this.cache.clear();
        return;
    }
  }

  private toTravelTime(
    from: string,
    to: string,
    minutes: number,
    source: TravelTime['source'],
  ): TravelTime {
    return { from, to, minutes, formatted: formatTravelMinutes(minutes), source };
  }
}
