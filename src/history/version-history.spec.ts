import { VersionHistory } from './version-history';

describe('VersionHistory', () => {
  const makeHistory = (capacity?: number) => {
    let counter = 0;
    return new VersionHistory<{ value: number }>({
      capacity,
      generateId: () => `v${++counter}`,
      now: () => new Date('2024-05-01T08:00:00.000Z'),
    });
  };

  it('starts empty with nothing to undo or redo', () => {
    const history = makeHistory();

    expect(history.size).toBe(0);
    expect(history.current()).toBeNull();
    expect(history.undo()).toEqual({ status: 'unavailable', message: 'Nothing to undo' });
    expect(history.redo()).toEqual({ status: 'unavailable', message: 'Nothing to redo' });
  });

  it('steps back and forth through recorded states', () => {
    const history = makeHistory();
    history.record({ value: 1 }, 'Initial');
    history.record({ value: 2 }, 'Second');
    history.record({ value: 3 }, 'Third');

    const undone = history.undo();
    expect(undone.status === 'ok' && undone.value.state).toEqual({ value: 2 });
    expect(undone.message).toBe('Undid: Third');

    history.undo();
    expect(history.canUndo).toBe(false);
    expect(history.undo().status).toBe('unavailable');

    const redone = history.redo();
    expect(redone.status === 'ok' && redone.value.state).toEqual({ value: 2 });
    expect(redone.message).toBe('Redid: Second');
  });

  it('drops the redo tail when recording after an undo', () => {
    const history = makeHistory();
    history.record({ value: 1 }, 'Initial');
    history.record({ value: 2 }, 'Second');
    history.undo();

    history.record({ value: 5 }, 'Branch');

    expect(history.canRedo).toBe(false);
    expect(history.list().map((entry) => entry.description)).toEqual(['Initial', 'Branch']);
  });

  it('keeps only the newest versions within capacity', () => {
    const history = makeHistory(3);
    [1, 2, 3, 4, 5].forEach((value) => history.record({ value }, `Step ${value}`));

    expect(history.size).toBe(3);
    expect(history.currentPosition).toBe(2);
    expect(history.list()).toEqual([
      { id: 'v3', description: 'Step 3', createdAt: '2024-05-01T08:00:00.000Z', position: 0, current: false },
      { id: 'v4', description: 'Step 4', createdAt: '2024-05-01T08:00:00.000Z', position: 1, current: false },
      { id: 'v5', description: 'Step 5', createdAt: '2024-05-01T08:00:00.000Z', position: 2, current: true },
    ]);
    history.undo();
    history.undo();
    expect(history.undo().status).toBe('unavailable');
    expect(history.current()?.state).toEqual({ value: 3 });
  });

  it('isolates stored states from later mutation', () => {
    const history = makeHistory();
    const state = { value: 1 };
    history.record(state, 'Initial');
    state.value = 99;

    const current = history.current();
    expect(current?.state).toEqual({ value: 1 });
    if (current) {
      current.state.value = 42;
    }
    expect(history.current()?.state).toEqual({ value: 1 });
  });

  it('rejects a capacity below one', () => {
    expect(() => makeHistory(0)).toThrow('History capacity must be a positive integer, got 0');
  });

  it('forgets everything on clear', () => {
    const history = makeHistory();
    history.record({ value: 1 }, 'Initial');
    history.clear();

    expect(history.size).toBe(0);
    expect(history.currentPosition).toBe(-1);
  });
});
