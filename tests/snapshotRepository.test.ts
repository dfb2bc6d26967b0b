import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { SnapshotRepository } from '../src/storage/repositories/SnapshotRepository.js';
import { DatabaseWrapper, IN_MEMORY } from '../src/storage/Database.js';
import { StorageError } from '../src/core/errors.js';
import { T0, at, hoursAgo, makeSnapshot, openTestDatabase } from './helpers.js';

describe('SnapshotRepository', () => {
  let database: DatabaseWrapper;
  let repository: SnapshotRepository;

  beforeEach(() => {
    database = openTestDatabase();
    repository = new SnapshotRepository(database);
  });

  afterEach(() => {
    database.close();
  });

  it('appends once per protocol and timestamp', () => {
    const snapshot = makeSnapshot('aave-v3', T0, { tvl: 100 });

    expect(repository.append(snapshot)).toBe(true);
    expect(repository.append({ ...snapshot, tvl: 999 })).toBe(false);
    expect(repository.history('aave-v3', new Date(0))).toHaveLength(1);
    expect(repository.latest('aave-v3')?.tvl).toBe(100);
  });

  it('returns the most recent snapshot', () => {
    repository.append(makeSnapshot('aave-v3', hoursAgo(2), { tvl: 1 }));
    repository.append(makeSnapshot('aave-v3', T0, { tvl: 3 }));
    repository.append(makeSnapshot('aave-v3', hoursAgo(1), { tvl: 2 }));
    repository.append(makeSnapshot('compound-v3', at(60_000), { tvl: 4 }));

    expect(repository.latest('aave-v3')).toEqual(makeSnapshot('aave-v3', T0, { tvl: 3 }));
    expect(repository.latest('unknown')).toBeNull();
  });

  it('finds the freshest snapshot at or before a cutoff', () => {
    repository.append(makeSnapshot('aave-v3', hoursAgo(30), { tvl: 1 }));
    repository.append(makeSnapshot('aave-v3', hoursAgo(24), { tvl: 2 }));
    repository.append(makeSnapshot('aave-v3', T0, { tvl: 3 }));

    expect(repository.asOf('aave-v3', hoursAgo(24))?.tvl).toBe(2);
    expect(repository.asOf('aave-v3', hoursAgo(25))?.tvl).toBe(1);
    expect(repository.asOf('aave-v3', hoursAgo(31))).toBeNull();
  });

  it('keeps absent metrics as null', () => {
    repository.append(makeSnapshot('aave-v3', T0, { tvl: 0 }));

    expect(repository.latest('aave-v3')).toEqual({
      protocolId: 'aave-v3',
      timestamp: T0,
      tvl: 0,
      apy7d: null,
      utilization: null,
    });
  });

  it('lists history newer than a cutoff, newest first', () => {
    repository.append(makeSnapshot('aave-v3', hoursAgo(48), { tvl: 1 }));
    repository.append(makeSnapshot('aave-v3', hoursAgo(24), { tvl: 2 }));
    repository.append(makeSnapshot('aave-v3', T0, { tvl: 3 }));

    const history = repository.history('aave-v3', hoursAgo(48));

    expect(history.map((s) => s.tvl)).toEqual([3, 2]);
  });

  it('overwrites only the TVL of an existing row when seeding', () => {
    repository.append(makeSnapshot('aave-v3', T0, { tvl: 100, apy7d: 5 }));

    repository.upsertForSeed(makeSnapshot('aave-v3', T0, { tvl: 35, apy7d: 1 }));

    expect(repository.history('aave-v3', new Date(0))).toHaveLength(1);
    expect(repository.latest('aave-v3')).toEqual(makeSnapshot('aave-v3', T0, { tvl: 35, apy7d: 5 }));
  });

  it('inserts a fresh row when seeding a new timestamp', () => {
    repository.upsertForSeed(makeSnapshot('aave-v3', T0, { tvl: 35, apy7d: 1.5, utilization: 0.97 }));

    expect(repository.latest('aave-v3')).toEqual(makeSnapshot('aave-v3', T0, { tvl: 35, apy7d: 1.5, utilization: 0.97 }));
  });

  it('raises StorageError once the database is closed', () => {
    database.close();

    expect(() => repository.latest('aave-v3')).toThrow(StorageError);
  });
});

describe('DatabaseWrapper', () => {
  it('refuses queries before initialization', () => {
    const database = new DatabaseWrapper({ databasePath: IN_MEMORY, busyTimeoutMs: 1000 });

    expect(() => database.ping()).toThrow('Database not initialized. Call initialize() first.');
  });

  it('answers a ping once open', () => {
    const database = openTestDatabase();

    expect(() => database.ping()).not.toThrow();
    database.close();
    expect(() => database.ping()).toThrow('Database not initialized. Call initialize() first.');
  });
});
