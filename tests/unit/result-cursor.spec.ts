import { describe, it, expect, beforeEach } from 'vitest';
import { ResultCursor } from '../../src/core/cursor/result-cursor.js';
import { BufferedResultSet } from '../../src/adapters/mysql/buffered-result.js';
import { FetchMode } from '../../src/core/domain/value-objects/fetch-mode.js';
import {
  InvalidArgumentError,
  OutOfRangeError,
  SqlNoSuchFieldError,
} from '../../src/core/domain/errors/index.js';

class User {
  readonly id: unknown;
  readonly name: unknown;

  constructor(fields: Record<string, unknown>) {
    this.id = fields.id;
    this.name = fields.name;
  }
}

function cursorOver(names: string[], data: unknown[][]): ResultCursor {
  return new ResultCursor(new BufferedResultSet(names, data));
}

describe('ResultCursor', () => {
  let cursor: ResultCursor;

  beforeEach(() => {
    cursor = cursorOver(['id', 'name'], [
      [1, 'ada'],
      [2, 'grace'],
      [3, 'linus'],
    ]);
  });

  it('should return every row then null in each fetch mode', () => {
    for (const mode of [FetchMode.Ordered, FetchMode.Assoc, FetchMode.Object, FetchMode.Column]) {
      const current = cursorOver(['id', 'name'], [
        [1, 'ada'],
        [2, 'grace'],
      ]);
      current.setFetchMode(mode);

      expect(current.next()).not.toBeNull();
      expect(current.next()).not.toBeNull();
      expect(current.next()).toBeNull();
      expect(current.rowCount()).toBe(2);
    }
  });

  it('should shape rows by fetch mode', () => {
    expect(cursor.next()).toEqual([1, 'ada']);
    expect(cursor.next(FetchMode.Assoc)).toEqual({ id: 2, name: 'grace' });

    cursor.setFetchMode(FetchMode.Column, 'name');
    expect(cursor.next()).toBe('linus');
  });

  it('should build objects with the configured row class', () => {
    cursor.setFetchMode(FetchMode.Object, User);
    const row = cursor.next();

    expect(row).toBeInstanceOf(User);
    expect(row).toEqual(new User({ id: 1, name: 'ada' }));
  });

  it('should build plain objects without a row class', () => {
    cursor.setFetchMode(FetchMode.Object);
    expect(cursor.next()).toEqual({ id: 1, name: 'ada' });
  });

  it('should let later duplicate column names win', () => {
    const dup = cursorOver(['id', 'id'], [[1, 2]]);
    expect(dup.next(FetchMode.Assoc)).toEqual({ id: 2 });
  });

  it('should peek with current() without consuming', () => {
    expect(cursor.current()).toEqual([1, 'ada']);
    expect(cursor.key()).toBe(0);
    expect(cursor.next()).toEqual([1, 'ada']);
    expect(cursor.key()).toBe(1);
  });

  it('should not consume the row when current() fails', () => {
    cursor.setFetchMode(FetchMode.Column, 'email');

    expect(() => cursor.current()).toThrow(SqlNoSuchFieldError);
    expect(cursor.key()).toBe(0);
    expect(cursor.next(FetchMode.Ordered)).toEqual([1, 'ada']);
  });

  it('should keep a column named __proto__ as a field', () => {
    const odd = cursorOver(['id', '__proto__'], [
      [1, 'x'],
      [2, 'y'],
      [3, 'z'],
    ]);

    const row = odd.next(FetchMode.Assoc);
    expect(row === null ? null : Object.entries(row)).toEqual([
      ['id', 1],
      ['__proto__', 'x'],
    ]);
    expect(odd.fetchColumn('__proto__')).toBe('y');

    odd.setFetchMode(FetchMode.Column, '__proto__');
    expect(odd.next()).toBe('z');
  });

  it('should return null from current() past the end', () => {
    cursor.fetchAll();
    expect(cursor.current()).toBeNull();
  });

  it('should seek to a row', () => {
    cursor.seek(2);
    expect(cursor.next()).toEqual([3, 'linus']);
    cursor.seek(0);
    expect(cursor.next()).toEqual([1, 'ada']);
  });

  it('should reject out of range seeks', () => {
    expect(() => cursor.seek(-1)).toThrow(OutOfRangeError);
    expect(() => cursor.seek(3)).toThrow(OutOfRangeError);
    expect(() => cursor.seek(1.5)).toThrow(OutOfRangeError);
  });

  it('should reject seeks on an empty result', () => {
    const empty = cursorOver(['id'], []);
    expect(() => empty.seek(0)).toThrow(OutOfRangeError);
    expect(() => empty.rewind()).not.toThrow();
    expect(empty.valid()).toBe(false);
  });

  it('should iterate from the first row', () => {
    cursor.next();
    expect([...cursor]).toEqual([
      [1, 'ada'],
      [2, 'grace'],
      [3, 'linus'],
    ]);
  });

  it('should fetch the remaining rows with fetchAll()', () => {
    cursor.next();
    cursor.setFetchMode(FetchMode.Column, 0);
    expect(cursor.fetchAll()).toEqual([2, 3]);
    expect(cursor.fetchAll()).toEqual([]);
  });

  it('should fetch single columns by index and by name', () => {
    expect(cursor.fetchColumn()).toBe(1);
    expect(cursor.fetchColumn('name')).toBe('grace');
    expect(cursor.fetchColumn(1)).toBe('linus');
    expect(cursor.fetchColumn()).toBeNull();
  });

  it('should reject missing columns in fetchColumn()', () => {
    expect(() => cursor.fetchColumn(5)).toThrow(OutOfRangeError);
    expect(() => cursor.fetchColumn('email')).toThrow(OutOfRangeError);
    expect(() => cursor.fetchColumn(0.5)).toThrow(InvalidArgumentError);
  });

  it('should fail Column mode on a missing field', () => {
    cursor.setFetchMode(FetchMode.Column, 'email');
    expect(() => cursor.next()).toThrow(SqlNoSuchFieldError);
  });

  it('should reject invalid fetch modes', () => {
    const unknownMode = Number('9');
    expect(() => cursor.setFetchMode(unknownMode)).toThrow(InvalidArgumentError);
    expect(() => cursor.next(Number('0'))).toThrow(InvalidArgumentError);
  });

  it('should expose the typed fetch helpers', () => {
    expect(cursor.fetchArray()).toEqual([1, 'ada']);
    expect(cursor.fetchAssoc()).toEqual({ id: 2, name: 'grace' });
    expect(cursor.fetchObject()).toEqual({ id: 3, name: 'linus' });
    expect(cursor.fetchObject()).toBeNull();
  });

  it('should expose the PEAR result API', () => {
    expect(cursor.numRows()).toBe(3);
    expect(cursor.numCols()).toBe(2);
    expect(cursor.fetchRow(FetchMode.Assoc)).toEqual({ id: 1, name: 'ada' });
  });

  it('should return a copy of field names', () => {
    const names = cursor.fieldNames();
    names.push('extra');
    expect(cursor.fieldNames()).toEqual(['id', 'name']);
  });
});
