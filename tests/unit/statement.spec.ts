import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { Statement, type StatementContext } from '../../src/client/statement.js';
import { QueryLogger } from '../../src/core/domain/services/query-logger.js';
import { FetchMode } from '../../src/core/domain/value-objects/fetch-mode.js';
import {
  FrozenStatementError,
  SqlMismatchError,
  SqlNotPreparedError,
  SqlTypeMismatchError,
} from '../../src/core/domain/errors/index.js';
import { FakeDriver, rows, type FakeStatement } from '../helpers/fake-driver.js';

const SELECT_BY_ID = 'SELECT id, name FROM users WHERE id = ?';

describe('Statement', () => {
  let driver: FakeDriver;
  let logger: QueryLogger;
  let context: StatementContext;

  beforeEach(() => {
    driver = new FakeDriver((sql, values) => {
      if (sql.startsWith('UPDATE')) return { affectedRows: 3 };
      return rows(['id', 'name'], [[values[0], `n${String(values[0])}`]]);
    });
    logger = new QueryLogger();
    context = { link: async () => driver, logger, queryLog: false };
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  function handle(index = 0): FakeStatement | undefined {
    return driver.statements[index];
  }

  describe('prepare', () => {
    it('should reject type hints that do not match the placeholders', async () => {
      const statement = new Statement(context);
      await expect(
        statement.prepare('SELECT ? + ? + ?', ['integer', 'integer']),
      ).rejects.toThrow(SqlTypeMismatchError);
    });

    it('should accept one type hint per placeholder', async () => {
      const statement = new Statement(context);
      await statement.prepare('SELECT ? + ? + ?', ['integer', 'double', 'string']);
      expect(statement.getParamTypes()).toEqual(['integer', 'double', 'string']);
      expect(statement.getQuery()).toBe('SELECT ? + ? + ?');
    });

    it('should refuse to prepare a frozen statement', async () => {
      const statement = new Statement(context);
      await statement.prepare(SELECT_BY_ID);
      statement.freeze();

      expect(statement.isFrozen()).toBe(true);
      await expect(statement.prepare('SELECT 1')).rejects.toThrow(FrozenStatementError);
      expect(statement.getQuery()).toBe(SELECT_BY_ID);
    });

    it('should close the previous handle when preparing again', async () => {
      const statement = new Statement(context);
      await statement.prepare(SELECT_BY_ID);
      await statement.prepare('SELECT 1');

      expect(handle(0)?.closed).toBe(true);
      expect(handle(1)?.closed).toBe(false);
    });
  });

  describe('execute', () => {
    it('should fail when nothing was prepared', async () => {
      const statement = new Statement(context);
      await expect(statement.execute()).rejects.toThrow(SqlNotPreparedError);
    });

    it('should fail on a wrong parameter count', async () => {
      const statement = new Statement(context);
      await statement.prepare(SELECT_BY_ID);

      await expect(statement.execute(1, 2)).rejects.toThrow(
        'Wrong parameter count for prepared statement: 1 expected, 2 given.',
      );
      await expect(statement.execute()).rejects.toThrow(SqlMismatchError);
    });

    it('should infer types from the first execute and coerce later values', async () => {
      const statement = new Statement(context);
      await statement.prepare('SELECT ?, ?, ?');

      await statement.execute(1, 2.5, 'x');
      expect(statement.getParamTypes()).toEqual(['integer', 'double', 'string']);

      await statement.execute('7abc', '3.5', 9);
      await statement.execute(null, null, null);

      expect(handle()?.executions).toEqual([
        [1, 2.5, 'x'],
        [7, 3.5, '9'],
        [null, null, null],
      ]);
    });

    it('should bind booleans as 1 and 0', async () => {
      const statement = new Statement(context);
      await statement.prepare(SELECT_BY_ID);

      await statement.execute(true);
      await statement.execute(false);

      expect(statement.getParamTypes()).toEqual(['string']);
      expect(handle()?.executions).toEqual([['1'], ['0']]);
    });

    it('should return null and record affected rows without a result set', async () => {
      const statement = new Statement(context);
      await statement.prepare('UPDATE users SET name = ? WHERE id > 0');

      expect(statement.getAffectedRows()).toBe(0);
      expect(await statement.execute('x')).toBeNull();
      expect(statement.getAffectedRows()).toBe(3);
    });

    it('should reuse one cursor and buffer across executions', async () => {
      const statement = new Statement(context);
      await statement.prepare(SELECT_BY_ID);

      const first = await statement.execute(1);
      const firstRows = first?.fetchAll();
      const buffer = first?.boundBuffer;

      const second = await statement.execute(2);

      expect(second).toBe(first);
      expect(second?.boundBuffer).toBe(buffer);
      expect(second?.fetchAll()).toEqual([[2, 'n2']]);
      expect(firstRows).toEqual([[1, 'n1']]);
      expect(handle()?.bindCount).toBe(1);
    });

    it('should read field names once', async () => {
      const statement = new Statement(context);
      await statement.prepare(SELECT_BY_ID);

      const cursor = await statement.execute(1);
      cursor?.setFetchMode(FetchMode.Assoc);
      expect(cursor?.fetchAll()).toEqual([{ id: 1, name: 'n1' }]);

      await statement.execute(2);
      expect(cursor?.next(FetchMode.Assoc)).toEqual({ id: 2, name: 'n2' });
      expect(handle()?.fieldNameReads).toBe(1);
    });

    it('should restore the default fetch mode on re-execute', async () => {
      const statement = new Statement(context);
      await statement.prepare(SELECT_BY_ID);

      const cursor = await statement.execute(1);
      cursor?.setFetchMode(FetchMode.Assoc);
      await statement.execute(2);

      expect(cursor?.getFetchMode()).toBe(FetchMode.Ordered);
      expect(cursor?.key()).toBe(0);
    });

    it('should serialize concurrent executions', async () => {
      const statement = new Statement(context);
      await statement.prepare(SELECT_BY_ID);

      const [a, b] = await Promise.all([statement.execute(1), statement.execute(2)]);

      expect(a).toBe(b);
      expect(handle()?.executions).toEqual([[1], [2]]);
      expect(b?.fetchAll()).toEqual([[2, 'n2']]);
    });

    it('should report every execution to the context', async () => {
      const onExecuted = vi.fn();
      const statement = new Statement({ ...context, onExecuted });
      await statement.prepare(SELECT_BY_ID);
      await statement.execute(1);

      expect(onExecuted).toHaveBeenCalledWith(handle());
    });

    it('should log prepare and execute when query logging is on', async () => {
      const statement = new Statement({ ...context, queryLog: true });
      await statement.prepare(SELECT_BY_ID);
      await statement.execute("o'brien");

      const logs = logger.getLogs();
      expect(logs.map((entry) => entry.command)).toEqual(['prepare', 'execute']);
      expect(logs[1]?.query).toBe("SELECT id, name FROM users WHERE id = 'o''brien'");
    });
  });

  it('should release the handle on close', async () => {
    const statement = new Statement(context);
    await statement.prepare(SELECT_BY_ID);
    await statement.close();

    expect(handle()?.closed).toBe(true);
    await expect(statement.execute(1)).rejects.toThrow(SqlNotPreparedError);
  });
});
