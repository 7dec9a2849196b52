import { NetworkStore } from '../network/network-store';
import { parseNetworkDocument, toNetworkDocument } from './network-document';

describe('network document', () => {
  const classes = ['re', 'ice'];

  const makeStore = () => {
    const store = new NetworkStore({ transportClasses: classes });
    store.addCity('Halle (Saale)', { lon: 11.97, lat: 51.48 });
    store.addCity('Frankfurt", "Oder', { lon: 14.55, lat: 52.35 });
    store.addCity('Frankfurt', { lon: 8.68, lat: 50.11 });
    store.addConnection('Halle (Saale)', 'Frankfurt", "Oder', 'ice');
    store.addConnection('Frankfurt', 'Halle (Saale)');
    store.setDurationOverride('Frankfurt', 'Halle (Saale)', 160);
    store.markBreak('Frankfurt', 'Halle (Saale)');
    store.setChainName(0, 'Ost-West');
    return store;
  };

  it('writes pair attributes as explicit from/to entries', () => {
    expect(toNetworkDocument(makeStore().snapshot())).toEqual({
      version: 1,
      cities: {
        'Halle (Saale)': [11.97, 51.48],
        'Frankfurt", "Oder': [14.55, 52.35],
        Frankfurt: [8.68, 50.11],
      },
      connections: [
        ['Halle (Saale)', 'Frankfurt", "Oder'],
        ['Frankfurt', 'Halle (Saale)'],
      ],
      train_types: [{ from: 'Halle (Saale)', to: 'Frankfurt", "Oder', value: 'ice' }],
      travel_times: [{ from: 'Frankfurt', to: 'Halle (Saale)', value: 160 }],
      daybreaks: [{ from: 'Frankfurt', to: 'Halle (Saale)', value: true }],
      route_chain_names: { '0': 'Ost-West' },
      zoomed_states: [],
    });
  });

  it('reads back what it wrote, including names with quotes and commas', () => {
    const snapshot = makeStore().snapshot();
    const json = JSON.parse(JSON.stringify(toNetworkDocument(snapshot)));

    expect(parseNetworkDocument(json, classes)).toEqual({
      status: 'ok',
      value: snapshot,
      message: 'Network document loaded.',
    });
  });

  it('passes zoom states through untouched', () => {
    const result = parseNetworkDocument(
      { cities: {}, connections: [], zoomed_states: [{ xlim: [5, 15] }] },
      classes,
    );
    expect(result.status === 'ok' && result.value.zoomedStates).toEqual([{ xlim: [5, 15] }]);
  });

  it('ignores day breaks stored as false', () => {
    const result = parseNetworkDocument(
      {
        cities: { A: [1, 50], B: [2, 50] },
        connections: [['A', 'B']],
        daybreaks: [{ from: 'A', to: 'B', value: false }],
      },
      classes,
    );
    expect(result.status === 'ok' && result.value.dayBreaks).toEqual([]);
  });

  it('rejects documents that do not match the schema', () => {
    const result = parseNetworkDocument({ cities: { A: [1] }, connections: [] }, classes);

    expect(result.status).toBe('invalid_input');
    expect(result.message).toMatch(/^Network document is invalid: \/cities\/A /);
  });

  it('rejects connections to unknown cities', () => {
    expect(
      parseNetworkDocument({ cities: { A: [1, 50] }, connections: [['A', 'B']] }, classes),
    ).toEqual({
      status: 'invalid_input',
      message: 'Connection A - B: City B does not exist.',
    });
  });

  it('rejects duplicate connections', () => {
    expect(
      parseNetworkDocument(
        {
          cities: { A: [1, 50], B: [2, 50] },
          connections: [
            ['A', 'B'],
            ['B', 'A'],
          ],
        },
        classes,
      ).status,
    ).toBe('duplicate');
  });

  it('rejects transport classes on unknown connections or of unknown kind', () => {
    const base = { cities: { A: [1, 50], B: [2, 50], C: [3, 50] }, connections: [['A', 'B']] };

    expect(
      parseNetworkDocument({ ...base, train_types: [{ from: 'A', to: 'C', value: 're' }] }, classes),
    ).toEqual({
      status: 'invalid_input',
      message: 'train_types names unknown connection A - C.',
    });
    expect(
      parseNetworkDocument(
        { ...base, train_types: [{ from: 'A', to: 'B', value: 'maglev' }] },
        classes,
      ),
    ).toEqual({ status: 'invalid_input', message: 'Unknown transport class maglev.' });
  });
});
