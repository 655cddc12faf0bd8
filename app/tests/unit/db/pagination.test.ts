import { describe, it, expect } from 'vitest';
import {
  DEFAULT_PAGE_SIZE,
  buildTodoListQuery,
  clampLimit,
  isUuid,
  takePage,
} from '../../../src/db/pagination.js';

const USER_ID = '7b0c1c2e-4a63-4c5e-9a0e-2f1d3c4b5a69';
const CURSOR = '3f2b8e1a-9c4d-4e5f-8a7b-6c5d4e3f2a1b';

describe('clampLimit', () => {
  it.each([
    [undefined, 20],
    ['', 20],
    ['abc', 20],
    ['0', 20],
    ['-5', 20],
    ['101', 20],
    ['2.5', 20],
    [' 10', 20],
    ['1', 1],
    ['50', 50],
    ['100', 100],
    [0, 20],
    [101, 20],
    [1.5, 20],
    [7, 7],
  ])('%j -> %i', (raw, expected) => {
    expect(clampLimit(raw)).toBe(expected);
  });

  it('defaults to 20', () => {
    expect(DEFAULT_PAGE_SIZE).toBe(20);
  });
});

describe('isUuid', () => {
  it('accepts canonical uuids in either case', () => {
    expect(isUuid(CURSOR)).toBe(true);
    expect(isUuid(CURSOR.toUpperCase())).toBe(true);
  });

  it('rejects anything else', () => {
    expect(isUuid('not-a-uuid')).toBe(false);
    expect(isUuid(`${CURSOR}x`)).toBe(false);
    expect(isUuid("' OR 1=1 --")).toBe(false);
  });
});

describe('buildTodoListQuery', () => {
  it('always scopes to the user and over-fetches by one', () => {
    const query = buildTodoListQuery({ userId: USER_ID, limit: 20 });

    expect(query.text).toBe(
      'SELECT id, user_id, title, description, status, due_at, created_at, updated_at ' +
        'FROM todos WHERE user_id = $1 ORDER BY created_at DESC, id DESC LIMIT $2',
    );
    expect(query.values).toEqual([USER_ID, 21]);
  });

  it('adds the status filter', () => {
    const query = buildTodoListQuery({ userId: USER_ID, status: 'completed', limit: 5 });

    expect(query.text).toContain('WHERE user_id = $1 AND status = $2 ORDER BY');
    expect(query.text).toMatch(/LIMIT \$3$/);
    expect(query.values).toEqual([USER_ID, 'completed', 6]);
  });

  it('anchors the cursor to a row owned by the same user', () => {
    const query = buildTodoListQuery({ userId: USER_ID, status: 'pending', cursor: CURSOR, limit: 10 });

    expect(query.text).toContain(
      'AND (created_at, id) < (SELECT c.created_at, c.id FROM todos c WHERE c.id = $3 AND c.user_id = $1)',
    );
    expect(query.values).toEqual([USER_ID, 'pending', CURSOR, 11]);
  });

  it('numbers the cursor parameter without a status filter', () => {
    const query = buildTodoListQuery({ userId: USER_ID, cursor: CURSOR, limit: 10 });

    expect(query.text).toContain('WHERE c.id = $2 AND c.user_id = $1');
    expect(query.values).toEqual([USER_ID, CURSOR, 11]);
  });

  it('clamps an out-of-range limit', () => {
    const query = buildTodoListQuery({ userId: USER_ID, limit: 500 });
    expect(query.values).toEqual([USER_ID, 21]);
  });
});

describe('takePage', () => {
  const rows = ['a', 'b', 'c', 'd'].map((id) => ({ id }));

  it('returns a cursor when more rows follow', () => {
    expect(takePage(rows, 3)).toEqual({ items: rows.slice(0, 3), nextCursor: 'c' });
  });

  it('returns no cursor on the last page', () => {
    expect(takePage(rows, 4)).toEqual({ items: rows });
    expect(takePage(rows.slice(0, 2), 3)).toEqual({ items: rows.slice(0, 2) });
  });

  it('handles an empty result', () => {
    expect(takePage([], 20)).toEqual({ items: [] });
  });
});
