import { NetworkStore } from '../network/network-store';
import { NetworkTravelTimes } from './network-travel-times';
import {
  TravelTimeEstimator,
  loadTravelTimeModel,
} from './travel-time-estimator';

describe('NetworkTravelTimes', () => {
  const makeFixture = () => {
    const estimator = new TravelTimeEstimator(loadTravelTimeModel());
    const estimate = jest.spyOn(estimator, 'estimate');
    const store = new NetworkStore({ transportClasses: ['re', 'ice'] });
    store.addCity('A', { lon: 0, lat: 0 });
    store.addCity('B', { lon: 1, lat: 0 });
    store.addCity('C', { lon: 0, lat: 1 });
    store.addConnection('A', 'B');
    return { store, estimate, travelTimes: new NetworkTravelTimes(store, estimator) };
  };

  it('estimates once per unordered pair', () => {
    const { travelTimes, estimate } = makeFixture();

    expect(travelTimes.between('A', 'B')).toEqual({
      status: 'ok',
      value: { from: 'A', to: 'B', minutes: 95, formatted: '1h 35m', source: 'estimate' },
      message: '',
    });
    travelTimes.between('B', 'A');

    expect(estimate).toHaveBeenCalledTimes(1);
    expect(travelTimes.computedEstimates).toBe(1);
    expect(travelTimes.cachedPairs).toBe(1);
  });

  it('uses the transport class of the connection', () => {
    const { store, travelTimes } = makeFixture();
    travelTimes.between('A', 'B');

    store.setTransportClass('A', 'B', 'ice');
    const result = travelTimes.between('A', 'B');

    expect(result.status === 'ok' && result.value.minutes).toBe(44);
    expect(travelTimes.computedEstimates).toBe(2);
  });

  it('returns overrides verbatim without estimating', () => {
    const { store, travelTimes, estimate } = makeFixture();
    store.setDurationOverride('A', 'B', 50);

    const result = travelTimes.between('B', 'A');

    expect(result.status === 'ok' && result.value).toEqual({
      from: 'B',
      to: 'A',
      minutes: 50,
      formatted: '50 min',
      source: 'override',
    });
    expect(estimate).not.toHaveBeenCalled();
  });

  it('recomputes after an endpoint moves', () => {
    const { store, travelTimes } = makeFixture();
    travelTimes.between('A', 'B');
    travelTimes.between('A', 'C');

    store.updateCityCoordinates('B', { lon: 2, lat: 0 });

    expect(travelTimes.cachedPairs).toBe(1);
    travelTimes.between('A', 'B');
    expect(travelTimes.computedEstimates).toBe(3);
  });

  it('forgets everything when the store is restored', () => {
    const { store, travelTimes } = makeFixture();
    travelTimes.between('A', 'B');
    store.restore(store.snapshot());

    expect(travelTimes.cachedPairs).toBe(0);
  });

  it('estimates unconnected pairs with the default class', () => {
    const { travelTimes, estimate } = makeFixture();
    travelTimes.between('A', 'C');

    expect(estimate).toHaveBeenCalledWith({ lon: 0, lat: 0 }, { lon: 0, lat: 1 }, null);
  });

  it('reports unknown cities', () => {
    const { travelTimes } = makeFixture();
    expect(travelTimes.between('A', 'Z')).toEqual({
      status: 'not_found',
      message: 'City Z does not exist.',
    });
  });

  it('stops listening once disposed', () => {
    const { store, travelTimes } = makeFixture();
    travelTimes.dispose();
    travelTimes.between('A', 'B');
    store.restore(store.snapshot());

    expect(travelTimes.cachedPairs).toBe(1);
  });
});
