import { describe, it, expect } from 'vitest';
import {
  countPlaceholders,
  findPlaceholders,
  substitutePlaceholders,
} from '../../src/core/domain/value-objects/placeholders.js';

describe('placeholders', () => {
  it('should find markers at value positions', () => {
    expect(findPlaceholders('SELECT ? + ?')).toEqual([7, 11]);
    expect(countPlaceholders('INSERT INTO t VALUES (?, ?, ?)')).toBe(3);
  });

  it('should skip string literals and quoted identifiers', () => {
    expect(countPlaceholders("SELECT '?', \"?\", `a?b` FROM t WHERE x = ?")).toBe(1);
    expect(countPlaceholders("SELECT 'it''s ?', 'a\\'?' , ?")).toBe(1);
  });

  it('should skip comments', () => {
    expect(countPlaceholders('SELECT ? /* ? */ FROM t # ?\nWHERE a = ?')).toBe(2);
    expect(countPlaceholders('SELECT ? -- ?\n')).toBe(1);
    expect(countPlaceholders('SELECT 1--?')).toBe(1);
  });

  it('should substitute values in order and keep extra markers', () => {
    expect(substitutePlaceholders('SELECT ?, ?, ?', ['1', "'x'"])).toBe("SELECT 1, 'x', ?");
    expect(substitutePlaceholders("SELECT '?', ?", ['2'])).toBe("SELECT '?', 2");
  });
});
