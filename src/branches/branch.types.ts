import type { ConnectionPair } from '../network/network.types';

export type BranchId = string;

export type BranchLineage =
  | { kind: 'root' }
  | { kind: 'split'; parentId: BranchId }
  | { kind: 'merge'; parentId: BranchId; secondaryParentId: BranchId };

export interface Branch {
  readonly id: BranchId;
  readonly name: string;
  readonly lineage: BranchLineage;
  readonly childIds: readonly BranchId[];
  readonly connections: ReadonlyArray<Readonly<ConnectionPair>>;
  readonly colorIndex: number;
  readonly lineStyleIndex: number;
  readonly createdAt: string;
}

export interface BranchRegistryState {
  branches: Branch[];
  activeBranchId: BranchId | null;
}

export interface BranchTree {
  roots: BranchId[];
  children: Record<BranchId, BranchId[]>;
}

export interface SplitOutcome {
  parentId: BranchId;
  childIds: [BranchId, BranchId];
}

export interface ApplyOutcome {
  branchId: BranchId;
  applied: ConnectionPair[];
  skipped: ConnectionPair[];
}
