import { BranchManager } from '../branches/branch-manager';
import type {
  ApplyOutcome,
  Branch,
  BranchId,
  BranchRegistryState,
  BranchTree,
  SplitOutcome,
} from '../branches/branch.types';
import { decomposeChains, type Chain } from '../chains/chain-decomposer';
import { summarizeChains, type ChainSummary } from '../chains/chain-summary';
import {
  VersionHistory,
  type VersionSummary,
} from '../history/version-history';
import {
  parseNetworkDocument,
  toNetworkDocument,
  type NetworkDocument,
} from '../persistence/network-document';
import {
  fail,
  succeed,
  type OperationResult,
} from '../shared/operation-result';
import { NetworkTravelTimes } from '../travel-time/network-travel-times';
import type { TravelTimeEstimator } from '../travel-time/travel-time-estimator';
import type { TravelTime } from '../travel-time/travel-time.types';
import { NetworkStore } from './network-store';
import type {
  City,
  ConnectionPair,
  ConnectionView,
  Coordinate,
  NetworkState,
  TransportClassId,
} from './network.types';

export interface WorkspaceState {
  network: NetworkState;
  branches: BranchRegistryState;
}

export type WorkspaceEventType = 'recorded' | 'undo' | 'redo' | 'loaded';

export interface WorkspaceEvent {
  type: WorkspaceEventType;
  description: string;
  versionId: string;
  position: number;
}

export interface NetworkWorkspaceOptions {
  estimator: TravelTimeEstimator;
  historyCapacity?: number;
  generateId?: () => string;
  now?: () => Date;
  /** Cities of the seed network, for `removeDefaultCities`. */
  defaultCityNames?: readonly string[];
}

export interface NetworkOverview {
  cities: City[];
  connections: ConnectionView[];
  activeBranchId: BranchId | null;
  canUndo: boolean;
  canRedo: boolean;
}

/**
 * One editable network: store, travel-time cache, branch DAG and history.
 * Every successful mutation records a version; failed ones record nothing.
 */
export class NetworkWorkspace {
  readonly store: NetworkStore;
  private readonly travelTimes: NetworkTravelTimes;
  private readonly branchManager: BranchManager;
  private readonly history: VersionHistory<WorkspaceState>;
  private readonly listeners = new Set<(event: WorkspaceEvent) => void>();

  constructor(
    initial: NetworkState,
    private readonly options: NetworkWorkspaceOptions,
  ) {
    const estimator = options.estimator;
    this.store = new NetworkStore({
      transportClasses: estimator.listTransportClasses().map((profile) => profile.id),
    });
    this.travelTimes = new NetworkTravelTimes(this.store, estimator);
    this.branchManager = new BranchManager(this.store, {
      recordVersion: (description) => this.record(description),
      generateId: options.generateId,
      now: options.now,
    });
    this.history = new VersionHistory<WorkspaceState>({
      capacity: options.historyCapacity,
      generateId: options.generateId,
      now: options.now,
    });
    this.load(initial, 'Initial state');
  }

  subscribe(listener: (event: WorkspaceEvent) => void): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  // --- readers -------------------------------------------------------------

  overview(): NetworkOverview {
    return {
      cities: this.store.listCities(),
      connections: this.store.listConnectionViews(),
      activeBranchId: this.branchManager.activeId,
      canUndo: this.history.canUndo,
      canRedo: this.history.canRedo,
    };
  }

  chains(): Chain[] {
    return decomposeChains(
      this.store.listConnections(),
      this.store.listBreakMarkers(),
    );
  }

  chainSummaries(): ChainSummary[] {
    return summarizeChains(this.chains(), this.store.getChainNames(), (pair) => {
      const result = this.travelTimes.between(pair.from, pair.to);
      return result.status === 'ok' ? result.value.minutes : null;
    });
  }

  travelTimeBetween(a: string, b: string): OperationResult<TravelTime> {
    return this.travelTimes.between(a, b);
  }

  listTransportClasses() {
    return this.options.estimator.listTransportClasses();
  }

  get defaultTransportClass(): TransportClassId {
    return this.options.estimator.defaultTransportClass;
  }

  branches(): Branch[] {
    return this.branchManager.list();
  }

  branch(branchId: BranchId): Branch | null {
    return this.branchManager.get(branchId);
  }

  branchTree(): BranchTree {
    return this.branchManager.tree();
  }

  get activeBranchId(): BranchId | null {
    return this.branchManager.activeId;
  }

  historyEntries(): VersionSummary[] {
    return this.history.list();
  }

  get historyCapacity(): number {
    return this.history.capacity;
  }

  // --- network mutations ---------------------------------------------------

  addCity(name: string, coordinate: Coordinate): OperationResult<City> {
    return this.recorded(this.store.addCity(name, coordinate));
  }

  updateCityCoordinates(name: string, coordinate: Coordinate): OperationResult<City> {
    return this.recorded(this.store.updateCityCoordinates(name, coordinate));
  }

  removeCity(name: string) {
    return this.recorded(this.store.removeCity(name));
  }

  /** Drops the seed network's cities that still exist, without rejoining. */
  removeDefaultCities(): OperationResult<{ cities: string[]; removed: ConnectionPair[] }> {
    const result = this.store.removeCities(this.options.defaultCityNames ?? []);
    if (result.status !== 'ok') {
      return fail('not_found', 'No default cities left to remove.');
    }
    return this.recorded(
      succeed(
        result.value,
        `Removed ${result.value.cities.length} default cities and ${result.value.removed.length} connections.`,
      ),
    );
  }

  addConnection(
    a: string,
    b: string,
    transportClass?: TransportClassId | null,
  ): OperationResult<ConnectionPair> {
    return this.recorded(this.store.addConnection(a, b, transportClass));
  }

  removeConnection(a: string, b: string): OperationResult<ConnectionPair> {
    return this.recorded(this.store.removeConnection(a, b));
  }

  setTransportClass(
    a: string,
    b: string,
    transportClass: TransportClassId,
  ): OperationResult<ConnectionPair> {
    return this.recorded(this.store.setTransportClass(a, b, transportClass));
  }

  markBreak(a: string, b: string): OperationResult<ConnectionPair> {
    return this.recorded(this.store.markBreak(a, b));
  }

  unmarkBreak(a: string, b: string): OperationResult<ConnectionPair> {
    return this.recorded(this.store.unmarkBreak(a, b));
  }

  setDurationOverride(a: string, b: string, minutes: number): OperationResult<ConnectionPair> {
    return this.recorded(this.store.setDurationOverride(a, b, minutes));
  }

  clearDurationOverride(a: string, b: string): OperationResult<ConnectionPair> {
    return this.recorded(this.store.clearDurationOverride(a, b));
  }

  setChainName(index: number, name: string): OperationResult<string> {
    return this.recorded(this.store.setChainName(index, name));
  }

  clearChainName(index: number): OperationResult<void> {
    return this.recorded(this.store.clearChainName(index));
  }

  // --- branches ------------------------------------------------------------

  split(branchId: BranchId, city: string): OperationResult<SplitOutcome> {
    return this.branchManager.split(branchId, city);
  }

  merge(
    firstId: BranchId,
    secondId: BranchId,
    firstCity: string,
    secondCity: string,
  ): OperationResult<Branch> {
    return this.branchManager.merge(firstId, secondId, firstCity, secondCity);
  }

  applyBranch(branchId?: BranchId | null): OperationResult<ApplyOutcome> {
    return this.branchManager.applyToNetwork(branchId);
  }

  setActiveBranch(branchId: BranchId): OperationResult<Branch> {
    return this.branchManager.setActive(branchId);
  }

  // --- history -------------------------------------------------------------

  undo(): OperationResult<VersionSummary> {
    return this.travel('undo');
  }

  redo(): OperationResult<VersionSummary> {
    return this.travel('redo');
  }

  // --- documents -----------------------------------------------------------

  exportDocument(): NetworkDocument {
    return toNetworkDocument(this.store.snapshot());
  }

  /** Replaces the whole network, reseeds the branches and resets history. */
  importDocument(input: unknown, description = 'Loaded network'): OperationResult<NetworkOverview> {
    const parsed = parseNetworkDocument(
      input,
      this.listTransportClasses().map((profile) => profile.id),
    );
    if (parsed.status !== 'ok') {
      return parsed;
    }
    this.load(parsed.value, description);
    return succeed(this.overview(), parsed.message);
  }

  private load(state: NetworkState, description: string): void {
    this.store.restore(state);
    this.branchManager.seedFromChains(this.chains(), this.store.getChainNames());
    this.history.clear();
    this.record(description, 'loaded');
  }

  private travel(direction: 'undo' | 'redo'): OperationResult<VersionSummary> {
    const result = direction === 'undo' ? this.history.undo() : this.history.redo();
    if (result.status !== 'ok') {
      return result;
    }
    const version = result.value;
    this.store.restore(version.state.network);
    this.branchManager.restore(version.state.branches);
    const summary = this.currentSummary();
    this.emit({
      type: direction,
      description: result.message,
      versionId: version.id,
      position: summary.position,
    });
    return succeed(summary, result.message);
  }

  private recorded<T>(result: OperationResult<T>): OperationResult<T> {
    if (result.status === 'ok') {
      this.record(result.message);
    }
    return result;
  }

  private record(description: string, type: WorkspaceEventType = 'recorded'): void {
    const version = this.history.record(
      { network: this.store.snapshot(), branches: this.branchManager.snapshot() },
      description,
    );
    this.emit({
      type,
      description,
      versionId: version.id,
      position: this.history.currentPosition,
    });
  }

  private currentSummary(): VersionSummary {
    const summary = this.history.list().find((entry) => entry.current);
    if (!summary) {
      throw new Error('History has no current version');
    }
    return summary;
  }

  private emit(event: WorkspaceEvent): void {
    this.listeners.forEach((listener) => listener(event));
  }
}
