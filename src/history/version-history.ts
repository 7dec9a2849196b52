import { randomUUID } from 'crypto';
import {
  fail,
  succeed,
  type OperationResult,
} from '../shared/operation-result';

export const DEFAULT_HISTORY_CAPACITY = 100;

export interface Version<TState> {
  id: string;
  description: string;
  createdAt: string;
  state: TState;
}

export type VersionSummary = Omit<Version<unknown>, 'state'> & {
  position: number;
  current: boolean;
};

export interface VersionHistoryOptions<TState> {
  capacity?: number;
  clone?: (state: TState) => TState;
  now?: () => Date;
  generateId?: () => string;
}

/**
 * Linear undo/redo over deep-copied states. Recording after an undo discards
 * the redo tail; above capacity the oldest versions are dropped.
 */
export class VersionHistory<TState> {
  readonly capacity: number;
  private versions: Version<TState>[] = [];
  private position = -1;
  private readonly clone: (state: TState) => TState;
  private readonly now: () => Date;
  private readonly generateId: () => string;

  constructor(options: VersionHistoryOptions<TState> = {}) {
    const capacity = options.capacity ?? DEFAULT_HISTORY_CAPACITY;
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error(`History capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
    this.clone = options.clone ?? ((state) => structuredClone(state));
    this.now = options.now ?? (() => new Date());
    this.generateId = options.generateId ?? randomUUID;
  }

  get size(): number {
    return this.versions.length;
  }

  get currentPosition(): number {
    return this.position;
  }

  get canUndo(): boolean {
    return this.position > 0;
  }

  get canRedo(): boolean {
    return this.position < this.versions.length - 1;
  }

  record(state: TState, description: string): Version<TState> {
    if (this.position < this.versions.length - 1) {
      this.versions = this.versions.slice(0, this.position + 1);
    }
    const version: Version<TState> = {
      id: this.generateId(),
      description,
      createdAt: this.now().toISOString(),
      state: this.clone(state),
    };
    this.versions.push(version);
    if (this.versions.length > this.capacity) {
      this.versions = this.versions.slice(this.versions.length - this.capacity);
    }
    this.position = this.versions.length - 1;
    return this.copy(version);
  }

  undo(): OperationResult<Version<TState>> {
    if (!this.canUndo) {
      return fail('unavailable', 'Nothing to undo');
    }
    this.position -= 1;
    const version = this.copy(this.versions[this.position]);
    return succeed(version, `Undid: ${this.versions[this.position + 1].description}`);
  }

  redo(): OperationResult<Version<TState>> {
    if (!this.canRedo) {
      return fail('unavailable', 'Nothing to redo');
    }
    this.position += 1;
    const version = this.copy(this.versions[this.position]);
    return succeed(version, `Redid: ${version.description}`);
  }

  current(): Version<TState> | null {
    const version = this.versions[this.position];
    return version ? this.copy(version) : null;
  }

  list(): VersionSummary[] {
    return this.versions.map((version, position) => ({
      id: version.id,
      description: version.description,
      createdAt: version.createdAt,
      position,
      current: position === this.position,
    }));
  }

  clear(): void {
    this.versions = [];
    this.position = -1;
  }

  private copy(version: Version<TState>): Version<TState> {
    return { ...version, state: this.clone(version.state) };
  }
}
