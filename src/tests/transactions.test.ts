import {inTransaction} from '../effects/EffectsFactory';

function createPool(failOn: string[] = []) {
  const statements: string[] = [];
  const client = {
    query: jest.fn(async (sql: string) => {
      statements.push(sql);
      if (failOn.includes(sql)) {
        throw new Error(`${sql} failed`);
      }
      return {rows: []};
    }),
    release: jest.fn(),
  };
  return {pool: {connect: jest.fn().mockResolvedValue(client)}, client, statements};
}

describe('inTransaction', () => {
  beforeEach(() => {
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('commits when the work succeeds', async () => {
    const {pool, client, statements} = createPool();

    await expect(inTransaction(pool, async () => 'stored')).resolves.toBe('stored');

    expect(statements).toEqual(['BEGIN', 'COMMIT']);
    expect(client.release).toHaveBeenCalledTimes(1);
  });

  it('rolls back and rethrows when the work fails', async () => {
    const {pool, client, statements} = createPool();

    await expect(inTransaction(pool, async () => {
      throw new Error('insert failed');
    })).rejects.toThrow('insert failed');

    expect(statements).toEqual(['BEGIN', 'ROLLBACK']);
    expect(client.release).toHaveBeenCalledTimes(1);
  });

  it('keeps the original error when the rollback fails too', async () => {
    const {pool, client} = createPool(['ROLLBACK']);

    await expect(inTransaction(pool, async () => {
      throw new Error('insert failed');
    })).rejects.toThrow('insert failed');

    expect(console.error).toHaveBeenCalledWith('Rollback failed:', new Error('ROLLBACK failed'));
    expect(client.release).toHaveBeenCalledTimes(1);
  });
});
