import {
  MappingTable,
  defaultMappings,
  normalizeMappings,
  type MappingData,
  type MappingStore,
} from '../../../src/domain/mapping/MappingTable';

function makeLogger() {
  return { debug: jest.fn(), info: jest.fn(), warn: jest.fn(), error: jest.fn() };
}

function makeStore(initial: MappingData = defaultMappings()) {
  let persisted: MappingData = initial;
  const store = {
    load: jest.fn(() => persisted),
    save: jest.fn(async (mappings: MappingData) => {
      persisted = mappings;
    }),
    get persisted() {
      return persisted;
    },
    set persisted(value: MappingData) {
      persisted = value;
    },
  };
  return store;
}

describe('MappingTable', () => {
  test('starts from the store contents', () => {
    const table = new MappingTable(makeStore(), makeLogger());

    expect(table.triggersFor('button_single')).toEqual(['toggle_listen']);
    expect(table.triggersFor('button_double')).toEqual(['send_last_transcript']);
    expect(table.triggersFor('button_long')).toEqual(['cycle_llm']);
    expect(table.triggersFor('raw_notify')).toEqual([]);
  });

  test('adding the same pair twice keeps a single entry', async () => {
    const store = makeStore();
    const table = new MappingTable(store, makeLogger());

    await table.addMapping('toggle_listen', 'button_single');

    expect(table.triggers('toggle_listen')).toEqual(['button_single']);
    expect(store.persisted.toggle_listen).toEqual(['button_single']);
  });

  test('a topic can fire several actions', async () => {
    const table = new MappingTable(makeStore(), makeLogger());

    await table.addMapping('noop', 'button_single');

    expect(table.triggersFor('button_single')).toEqual(['toggle_listen', 'noop']);
  });

  test('removing a pair that was never added is a no-op', async () => {
    const store = makeStore();
    const table = new MappingTable(store, makeLogger());

    await expect(table.removeMapping('unknown_action', 'button_single')).resolves.toBeUndefined();
    await table.removeMapping('toggle_listen', 'button_long');

    expect(table.snapshot()).toEqual(defaultMappings());
  });

  test('removing the last topic keeps the action with no triggers', async () => {
    const store = makeStore();
    const table = new MappingTable(store, makeLogger());

    await table.removeMapping('cycle_llm', 'button_long');

    expect(table.actions()).toContain('cycle_llm');
    expect(table.triggers('cycle_llm')).toEqual([]);
    expect(table.triggersFor('button_long')).toEqual([]);
    expect(store.persisted.cycle_llm).toEqual([]);
  });

  test('every mutation writes a full snapshot', async () => {
    const store = makeStore();
    const table = new MappingTable(store, makeLogger());

    await table.addMapping('noop', 'button_long');
    await table.removeMapping('toggle_listen', 'button_single');

    expect(store.save).toHaveBeenCalledTimes(2);
    expect(store.save.mock.calls[1][0]).toEqual({
      toggle_listen: [],
      send_last_transcript: ['button_double'],
      cycle_llm: ['button_long'],
      noop: ['button_long'],
    });
  });

  test('overlapping flushes land in mutation order', async () => {
    const saved: MappingData[] = [];
    const store: MappingStore = {
      load: () => defaultMappings(),
      save: (mappings) =>
        new Promise((resolve) => {
          // First write is the slowest; it must still finish first.
          setTimeout(() => {
            saved.push(mappings);
            resolve();
          }, saved.length === 0 ? 20 : 0);
        }),
    };
    const table = new MappingTable(store, makeLogger());

    const first = table.addMapping('noop', 'button_single');
    const second = table.addMapping('noop', 'button_double');
    await Promise.all([first, second]);

    expect(saved).toHaveLength(2);
    expect(saved[0].noop).toEqual(['button_single']);
    expect(saved[1].noop).toEqual(['button_single', 'button_double']);
  });

  test('a failed save is logged and the in-memory table is kept', async () => {
    const logger = makeLogger();
    const store = makeStore();
    store.save.mockRejectedValueOnce(new Error('disk full'));
    const table = new MappingTable(store, logger);

    await expect(table.addMapping('noop', 'button_single')).resolves.toBeUndefined();

    expect(table.triggersFor('button_single')).toEqual(['toggle_listen', 'noop']);
    expect(logger.warn).toHaveBeenCalledWith('Saving mappings failed; keeping in-memory table', {
      error: 'disk full',
    });

    // The queue keeps working after a failure.
    await table.addMapping('noop', 'button_double');
    expect(store.persisted.noop).toEqual(['button_single', 'button_double']);
  });

  test('reload picks up external edits without writing', async () => {
    const store = makeStore();
    const table = new MappingTable(store, makeLogger());

    store.persisted = { noop: ['button_single'] };
    await table.reload();

    expect(table.rows()).toEqual([{ topic: 'button_single', action: 'noop' }]);
    expect(store.save).not.toHaveBeenCalled();
  });

  test('reload waits for queued flushes before reading', async () => {
    const store = makeStore();
    const table = new MappingTable(store, makeLogger());

    const added = table.addMapping('noop', 'button_single');
    await table.reload();
    await added;

    expect(store.save).toHaveBeenCalledTimes(1);
    expect(table.triggers('noop')).toEqual(['button_single']);
    expect(store.persisted.noop).toEqual(['button_single']);
  });

  test('replace normalizes and persists the new table', async () => {
    const store = makeStore();
    const table = new MappingTable(store, makeLogger());

    await table.replace({ ' noop ': [' button_long ', 'button_long', ''] });

    expect(table.snapshot()).toEqual({ noop: ['button_long'] });
    expect(store.persisted).toEqual({ noop: ['button_long'] });
  });

  test('snapshot is a copy', () => {
    const table = new MappingTable(makeStore(), makeLogger());

    const snapshot = table.snapshot();
    snapshot.toggle_listen.push('button_long');

    expect(table.triggers('toggle_listen')).toEqual(['button_single']);
  });

  test('random add/remove sequences agree with a plain set model and survive reload', async () => {
    const actions = ['toggle_listen', 'send_last_transcript', 'cycle_llm', 'noop'];
    const topics = ['button_single', 'button_double', 'button_long', 'raw_notify'];
    const store = makeStore({});
    const table = new MappingTable(store, makeLogger());
    const model = new Set<string>();

    let seed = 7;
    const next = (n: number) => {
      seed = (seed * 1103515245 + 12345) % 2147483648;
      return seed % n;
    };

    for (let i = 0; i < 200; i++) {
      const action = actions[next(actions.length)];
      const topic = topics[next(topics.length)];
      if (next(2) === 0) {
        void table.addMapping(action, topic);
        model.add(`${action}|${topic}`);
      } else {
        void table.removeMapping(action, topic);
        model.delete(`${action}|${topic}`);
      }
    }
    await table.whenFlushed();

    const expectedFor = (topic: string) =>
      actions.filter((action) => model.has(`${action}|${topic}`)).sort();

    for (const topic of topics) {
      expect([...table.triggersFor(topic)].sort()).toEqual(expectedFor(topic));
    }

    const reloaded = new MappingTable(store, makeLogger());
    for (const topic of topics) {
      expect([...reloaded.triggersFor(topic)].sort()).toEqual(expectedFor(topic));
    }
  });
});

describe('normalizeMappings', () => {
  test('falls back to defaults for non-objects', () => {
    expect(normalizeMappings(null)).toEqual(defaultMappings());
    expect(normalizeMappings('button_single')).toEqual(defaultMappings());
    expect(normalizeMappings(['toggle_listen'])).toEqual(defaultMappings());
  });

  test('drops malformed entries', () => {
    expect(
      normalizeMappings({
        toggle_listen: ['button_single', 3, ' button_single ', null],
        cycle_llm: 'button_long',
        '  ': ['button_double'],
        noop: [],
      })
    ).toEqual({ toggle_listen: ['button_single'], noop: [] });
  });

  test('an empty object stays empty', () => {
    expect(normalizeMappings({})).toEqual({});
  });
});
