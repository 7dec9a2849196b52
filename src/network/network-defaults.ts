import { parseNetworkDocument } from '../persistence/network-document';
import { readCatalogData, resolveCatalogPath } from '../shared/catalog-file';
import type { NetworkState, TransportClassId } from './network.types';

export const NETWORK_DEFAULTS_FILE = 'network/defaults.yaml';

/** Seed network shipped in the catalog; throws if the file is broken. */
export function loadDefaultNetwork(
  transportClasses: readonly TransportClassId[],
  override?: string,
): NetworkState {
  const path = resolveCatalogPath(NETWORK_DEFAULTS_FILE, override);
  const result = parseNetworkDocument(readCatalogData(path), transportClasses);
  if (result.status !== 'ok') {
    throw new Error(`Network defaults ${path} are invalid: ${result.message}`);
  }
  return result.value;
}
