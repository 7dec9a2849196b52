import { randomUUID } from 'crypto';
import type { Chain } from '../chains/chain-decomposer';
import { defaultChainName } from '../chains/chain-summary';
import { connectionKey, otherEndpoint, touches } from '../network/connection-key';
import type { NetworkStore } from '../network/network-store';
import type { ConnectionPair } from '../network/network.types';
import {
  fail,
  succeed,
  type OperationResult,
} from '../shared/operation-result';
import { BRANCH_COLORS, BRANCH_LINE_STYLES } from './branch.constants';
import type {
  ApplyOutcome,
  Branch,
  BranchId,
  BranchLineage,
  BranchRegistryState,
  BranchTree,
  SplitOutcome,
} from './branch.types';

export interface BranchManagerOptions {
  /** Called after every successful split, merge, apply and change of the active branch. */
  recordVersion?: (description: string) => void;
  generateId?: () => string;
  now?: () => Date;
}

function dedupePairs(pairs: Iterable<ConnectionPair>): ConnectionPair[] {
  const seen = new Set<string>();
  const result: ConnectionPair[] = [];
  for (const pair of pairs) {
    const key = connectionKey(pair.from, pair.to);
    if (seen.has(key)) {
      continue;
    }
    seen.add(key);
    result.push({ from: pair.from, to: pair.to });
  }
  return result;
}

/** Branches never change once created; lineage and edges included. */
function freezeBranch(branch: Branch): Branch {
  return Object.freeze({
    ...branch,
    lineage: Object.freeze({ ...branch.lineage }),
    childIds: Object.freeze([...branch.childIds]),
    connections: Object.freeze(
      branch.connections.map((pair) => Object.freeze({ from: pair.from, to: pair.to })),
    ),
  });
}

/**
 * Connected groups of the branch's cities once `removed` is taken out. Groups
 * reached from `seeds` come first, in seed order.
 */
function componentsWithout(
  connections: readonly ConnectionPair[],
  removed: string,
  seeds: readonly string[],
): Array<Set<string>> {
  const adjacency = new Map<string, string[]>();
  connections.forEach((pair) => {
    if (touches(pair, removed)) {
      return;
    }
    adjacency.set(pair.from, [...(adjacency.get(pair.from) ?? []), pair.to]);
    adjacency.set(pair.to, [...(adjacency.get(pair.to) ?? []), pair.from]);
  });

  const visited = new Set<string>();
  const components: Array<Set<string>> = [];
  const starts = [...seeds, ...adjacency.keys()];
  for (const start of starts) {
    if (visited.has(start) || start === removed) {
      continue;
    }
    const component = new Set<string>();
    const queue = [start];
    visited.add(start);
    while (queue.length) {
      const current = queue.shift();
      if (current === undefined) {
        break;
      }
      component.add(current);
      for (const next of adjacency.get(current) ?? []) {
        if (!visited.has(next)) {
          visited.add(next);
          queue.push(next);
        }
      }
    }
    components.push(component);
  }
  return components;
}

export class BranchManager {
  private branches = new Map<BranchId, Branch>();
  private activeBranchId: BranchId | null = null;
  private paletteCursor = 0;
  private readonly recordVersion: (description: string) => void;
  private readonly generateId: () => string;
  private readonly now: () => Date;

  constructor(
    private readonly store: NetworkStore,
    options: BranchManagerOptions = {},
  ) {
    this.recordVersion = options.recordVersion ?? (() => undefined);
    this.generateId = options.generateId ?? randomUUID;
    this.now = options.now ?? (() => new Date());
  }

  get activeId(): BranchId | null {
    return this.activeBranchId;
  }

  list(): Branch[] {
    return Array.from(this.branches.values());
  }

  get(branchId: BranchId): Branch | null {
    return this.branches.get(branchId) ?? null;
  }

  /** One root branch per chain; replaces whatever the registry held. */
  seedFromChains(
    chains: readonly Chain[],
    names: ReadonlyMap<number, string> = new Map(),
  ): Branch[] {
    this.branches = new Map();
    this.activeBranchId = null;
    const seeded = chains.map((chain, index) =>
      this.createBranch(
        names.get(index) ?? defaultChainName(index),
        { kind: 'root' },
        dedupePairs(chain),
      ),
    );
    this.activeBranchId = seeded[0]?.id ?? null;
    return seeded;
  }

  setActive(branchId: BranchId): OperationResult<Branch> {
    const branch = this.branches.get(branchId);
    if (!branch) {
      return fail('not_found', `Branch ${branchId} does not exist.`);
    }
    if (this.activeBranchId !== branch.id) {
      this.activeBranchId = branch.id;
      this.recordVersion(`Activated branch ${branch.name}`);
    }
    return succeed(branch, `Branch ${branch.name} is now active.`);
  }

  split(branchId: BranchId, city: string): OperationResult<SplitOutcome> {
    const parent = this.branches.get(branchId);
    if (!parent) {
      return fail('not_found', 'Invalid branch');
    }
    const incident = parent.connections.filter((pair) => touches(pair, city));
    if (!incident.length) {
      return fail('invalid_input', `City ${city} not found in branch ${parent.name}`);
    }
    const neighbours = Array.from(
      new Set(incident.map((pair) => otherEndpoint(pair, city))),
    );
    if (neighbours.length < 2) {
      return fail(
        'invalid_input',
        `City ${city} is not a valid split point (need at least 2 connections)`,
      );
    }

    const components = componentsWithout(parent.connections, city, neighbours);
    const reachedFromCity = components.filter((component) =>
      neighbours.some((neighbour) => component.has(neighbour)),
    );
    if (reachedFromCity.length < 2) {
      return fail(
        'invalid_input',
        'Cannot split at this city - would not create separate branches',
      );
    }

    // The first group goes to A, every other group to B.
    const firstGroup = components[0];
    const edgesA: ConnectionPair[] = [];
    const edgesB: ConnectionPair[] = [];
    parent.connections.forEach((pair) => {
      const anchor = pair.from === city ? pair.to : pair.from;
      (firstGroup.has(anchor) ? edgesA : edgesB).push({ ...pair });
    });

    const childA = this.createBranch(
      `${parent.name}-A`,
      { kind: 'split', parentId: parent.id },
      edgesA,
    );
    const childB = this.createBranch(
      `${parent.name}-B`,
      { kind: 'split', parentId: parent.id },
      edgesB,
    );
    this.registerChildren(parent.id, [childA.id, childB.id]);
    this.activeBranchId = childA.id;

    this.recordVersion(`Split route at ${city}`);
    return succeed(
      { parentId: parent.id, childIds: [childA.id, childB.id] },
      `Split route into ${childA.name} and ${childB.name} at ${city}`,
    );
  }

  merge(
    firstId: BranchId,
    secondId: BranchId,
    firstCity: string,
    secondCity: string,
  ): OperationResult<Branch> {
    const first = this.branches.get(firstId);
    const second = this.branches.get(secondId);
    if (!first || !second) {
      return fail('not_found', 'Invalid branch(es)');
    }
    if (first.id === second.id) {
      return fail('invalid_input', 'Cannot merge a branch with itself');
    }
    if (!first.connections.some((pair) => touches(pair, firstCity))) {
      return fail('invalid_input', `City ${firstCity} not found in branch ${first.name}`);
    }
    if (!second.connections.some((pair) => touches(pair, secondCity))) {
      return fail('invalid_input', `City ${secondCity} not found in branch ${second.name}`);
    }
    if (firstCity === secondCity) {
      return fail('invalid_input', 'A city cannot be connected to itself.');
    }

    const merged = this.createBranch(
      `${first.name}-${second.name}-merged`,
      { kind: 'merge', parentId: first.id, secondaryParentId: second.id },
      dedupePairs([
        ...first.connections,
        ...second.connections,
        { from: firstCity, to: secondCity },
      ]),
    );
    this.registerChildren(first.id, [merged.id]);
    this.registerChildren(second.id, [merged.id]);
    this.activeBranchId = merged.id;

    this.recordVersion(`Merged ${first.name} and ${second.name}`);
    return succeed(merged, `Merged branches into ${merged.name}`);
  }

  /**
   * Replaces the store's connection set with a branch's edges; the active
   * branch when no id is given. Edges whose cities no longer exist are
   * skipped.
   */
  applyToNetwork(branchId?: BranchId | null): OperationResult<ApplyOutcome> {
    const id = branchId ?? this.activeBranchId;
    if (!id) {
      return fail('invalid_input', 'No active branch selected');
    }
    const branch = this.branches.get(id);
    if (!branch) {
      return fail('invalid_input', `Branch ${id} does not exist.`);
    }
    const { applied, skipped } = this.store.replaceConnections(branch.connections);
    this.recordVersion(`Applied branch ${branch.name}`);
    return succeed(
      { branchId: branch.id, applied, skipped },
      'Route data updated from branch',
    );
  }

  tree(): BranchTree {
    const roots: BranchId[] = [];
    const children: Record<BranchId, BranchId[]> = {};
    this.branches.forEach((branch) => {
      if (branch.lineage.kind === 'root') {
        roots.push(branch.id);
      }
      if (branch.childIds.length) {
        children[branch.id] = [...branch.childIds];
      }
    });
    return { roots, children };
  }

  snapshot(): BranchRegistryState {
    return {
      branches: this.list(),
      activeBranchId: this.activeBranchId,
    };
  }

  restore(state: BranchRegistryState): void {
    this.branches = new Map(state.branches.map((branch) => [branch.id, freezeBranch(branch)]));
    this.activeBranchId =
      state.activeBranchId && this.branches.has(state.activeBranchId)
        ? state.activeBranchId
        : null;
  }

  private createBranch(
    name: string,
    lineage: BranchLineage,
    connections: ConnectionPair[],
  ): Branch {
    const cursor = this.paletteCursor;
    this.paletteCursor += 1;
    const branch = freezeBranch({
      id: this.generateId(),
      name,
      lineage,
      childIds: [],
      connections,
      colorIndex: cursor % BRANCH_COLORS.length,
      lineStyleIndex: cursor % BRANCH_LINE_STYLES.length,
      createdAt: this.now().toISOString(),
    });
    this.branches.set(branch.id, branch);
    return branch;
  }

  private registerChildren(parentId: BranchId, childIds: BranchId[]): void {
    const parent = this.branches.get(parentId);
    if (!parent) {
      throw new Error(`Branch ${parentId} vanished while registering children`);
    }
    this.branches.set(
      parentId,
      freezeBranch({ ...parent, childIds: [...parent.childIds, ...childIds] }),
    );
  }
}
