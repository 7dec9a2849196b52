import { connectionKey, type ConnectionKey } from '../network/connection-key';
import type { ConnectionPair } from '../network/network.types';

/** Connections in walk order; each one starts where the previous one ended. */
export type Chain = ConnectionPair[];

interface AdjacentEdge {
  key: ConnectionKey;
  to: string;
}

interface WalkFrame {
  city: string;
  next: number;
}

const byName = (a: string, b: string) => (a < b ? -1 : a > b ? 1 : 0);

function buildAdjacency(
  connections: readonly ConnectionPair[],
): Map<string, AdjacentEdge[]> {
  const adjacency = new Map<string, AdjacentEdge[]>();
  const addEdge = (from: string, edge: AdjacentEdge) => {
    const list = adjacency.get(from) ?? [];
    list.push(edge);
    adjacency.set(from, list);
  };
  const seen = new Set<ConnectionKey>();
  connections.forEach((pair) => {
    const key = connectionKey(pair.from, pair.to);
    if (pair.from === pair.to || seen.has(key)) {
      return;
    }
    seen.add(key);
    addEdge(pair.from, { key, to: pair.to });
    addEdge(pair.to, { key, to: pair.from });
  });
  return adjacency;
}

/**
 * Splits the connection set into chains. The walk is depth-first on an
 * explicit stack and tracks visited edges, so a city can sit in several
 * chains. A chain ends after a break-marked edge and wherever the walk has to
 * backtrack. Start cities are taken in name order, dead ends first, which
 * makes the output deterministic for a given connection order.
 */
export function decomposeChains(
  connections: readonly ConnectionPair[],
  breakMarkers: readonly ConnectionPair[] = [],
): Chain[] {
  const adjacency = buildAdjacency(connections);
  const breaks = new Set(breakMarkers.map((pair) => connectionKey(pair.from, pair.to)));
  const visited = new Set<ConnectionKey>();
  const chains: Chain[] = [];

  const cities = Array.from(adjacency.keys()).sort(byName);
  const deadEnds = cities.filter((city) => (adjacency.get(city) ?? []).length === 1);
  const startOrder = [...deadEnds, ...cities];

  for (const start of startOrder) {
    const edges = adjacency.get(start) ?? [];
    if (edges.every((edge) => visited.has(edge.key))) {
      continue;
    }

    let buffer: Chain = [];
    let tail = start;
    const flush = () => {
      if (buffer.length) {
        chains.push(buffer);
        buffer = [];
      }
    };

    const stack: WalkFrame[] = [{ city: start, next: 0 }];
    while (stack.length) {
      const frame = stack[stack.length - 1];
      const frameEdges = adjacency.get(frame.city) ?? [];
      let edge: AdjacentEdge | undefined;
      while (frame.next < frameEdges.length) {
        const candidate = frameEdges[frame.next];
        frame.next += 1;
        if (!visited.has(candidate.key)) {
          edge = candidate;
          break;
        }
      }
      if (!edge) {
        stack.pop();
        continue;
      }

      visited.add(edge.key);
      if (frame.city !== tail) {
        flush();
      }
      buffer.push({ from: frame.city, to: edge.to });
      tail = edge.to;
      if (breaks.has(edge.key)) {
        flush();
      }
      stack.push({ city: edge.to, next: 0 });
    }
    flush();
  }

  return chains;
}

export function chainCities(chain: Chain): string[] {
  if (!chain.length) {
    return [];
  }
  return [chain[0].from, ...chain.map((pair) => pair.to)];
}
