import { chainCities, decomposeChains } from './chain-decomposer';

const pairs = (...names: Array<[string, string]>) =>
  names.map(([from, to]) => ({ from, to }));

describe('decomposeChains', () => {
  it('walks a simple line in one chain', () => {
    expect(decomposeChains(pairs(['A', 'B'], ['B', 'C']))).toEqual([
      pairs(['A', 'B'], ['B', 'C']),
    ]);
  });

  it('starts at the dead end with the lowest name', () => {
    expect(decomposeChains(pairs(['C', 'B'], ['B', 'A']))).toEqual([
      pairs(['A', 'B'], ['B', 'C']),
    ]);
  });

  it('ends a chain after a break-marked connection', () => {
    expect(decomposeChains(pairs(['A', 'B'], ['B', 'C']), pairs(['B', 'A']))).toEqual([
      pairs(['A', 'B']),
      pairs(['B', 'C']),
    ]);
  });

  it('splits a single line at one break into two chains covering every connection', () => {
    const line = pairs(['A', 'B'], ['B', 'C'], ['C', 'D'], ['D', 'E']);
    const chains = decomposeChains(line, pairs(['C', 'B']));

    expect(chains).toHaveLength(2);
    expect(chains.map((chain) => chain.length)).toEqual([2, 2]);
  });

  it('starts a new chain where the walk backtracks', () => {
    expect(decomposeChains(pairs(['A', 'B'], ['B', 'C'], ['B', 'D']))).toEqual([
      pairs(['A', 'B'], ['B', 'C']),
      pairs(['B', 'D']),
    ]);
  });

  it('covers a cycle in one chain', () => {
    expect(decomposeChains(pairs(['A', 'B'], ['B', 'C'], ['C', 'A']))).toEqual([
      pairs(['A', 'B'], ['B', 'C'], ['C', 'A']),
    ]);
  });

  it('returns one chain per component', () => {
    expect(decomposeChains(pairs(['C', 'D'], ['A', 'B']))).toEqual([
      pairs(['A', 'B']),
      pairs(['C', 'D']),
    ]);
  });

  it('uses every connection exactly once', () => {
    const connections = pairs(
      ['A', 'B'],
      ['B', 'C'],
      ['C', 'D'],
      ['B', 'E'],
      ['E', 'F'],
      ['F', 'C'],
    );
    const edges = decomposeChains(connections, pairs(['C', 'D'])).flat();

    expect(edges).toHaveLength(connections.length);
    const keys = edges.map((edge) => [edge.from, edge.to].sort().join('|'));
    expect(new Set(keys).size).toBe(connections.length);
  });

  it('ignores duplicates and self-loops', () => {
    expect(decomposeChains(pairs(['A', 'B'], ['B', 'A'], ['A', 'A']))).toEqual([
      pairs(['A', 'B']),
    ]);
  });

  it('returns nothing for an empty network', () => {
    expect(decomposeChains([])).toEqual([]);
  });
});

describe('chainCities', () => {
  it('lists the visited cities in order', () => {
    expect(chainCities(pairs(['A', 'B'], ['B', 'C']))).toEqual(['A', 'B', 'C']);
    expect(chainCities([])).toEqual([]);
  });
});
