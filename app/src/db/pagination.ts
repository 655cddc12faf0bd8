/**
 * Cursor pagination for todo listings.
 *
 * Items are ordered newest first by (created_at DESC, id DESC). The cursor is
 * the id of the last item of the previous page; the next page holds the rows
 * that sort strictly after that item. One extra row is fetched to detect
 * whether another page follows.
 */
import type { TodoListParams } from '../types/todo.js';

export const DEFAULT_PAGE_SIZE = 20;
export const MAX_PAGE_SIZE = 100;

export const TODO_COLUMNS =
  'id, user_id, title, description, status, due_at, created_at, updated_at';

const UUID_RE = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

export function isUuid(value: string): boolean {
  return UUID_RE.test(value);
}

/**
 * Normalize a requested page size. Anything that is not an integer in
 * [1, MAX_PAGE_SIZE] becomes DEFAULT_PAGE_SIZE.
 */
export function clampLimit(raw: string | number | undefined): number {
  let n: number;
  if (typeof raw === 'number') {
    n = raw;
  } else if (raw !== undefined && /^[+-]?\d+$/.test(raw)) {
    n = Number(raw);
  } else {
    return DEFAULT_PAGE_SIZE;
  }

  if (!Number.isInteger(n) || n < 1 || n > MAX_PAGE_SIZE) {
    return DEFAULT_PAGE_SIZE;
  }
  return n;
}

export interface SqlQuery {
  text: string;
  values: unknown[];
}

/**
 * Build the listing query. The owner filter is always the first predicate;
 * callers cannot produce a query that omits it.
 */
export function buildTodoListQuery(params: TodoListParams): SqlQuery {
  const limit = clampLimit(params.limit);
  const values: unknown[] = [params.userId];
  const where = ['user_id = $1'];

  if (params.status) {
    values.push(params.status);
    where.push(`status = $${values.length}`);
  }

  if (params.cursor) {
    values.push(params.cursor);
    // An unknown cursor (or one owned by another user) yields an empty
    // sub-select, a NULL comparison and therefore an empty page.
    where.push(
      `(created_at, id) < (SELECT c.created_at, c.id FROM todos c WHERE c.id = $${values.length} AND c.user_id = $1)`,
    );
  }

  values.push(limit + 1);

  return {
    text:
      `SELECT ${TODO_COLUMNS} FROM todos WHERE ${where.join(' AND ')} ` +
      `ORDER BY created_at DESC, id DESC LIMIT $${values.length}`,
    values,
  };
}

export interface Page<T> {
  items: T[];
  nextCursor?: string;
}

/** Trim an over-fetched result to `limit` rows and derive the next cursor. */
export function takePage<T extends { id: string }>(rows: T[], limit: number): Page<T> {
  if (rows.length <= limit) {
    return { items: rows };
  }
  const items = rows.slice(0, limit);
  return { items, nextCursor: items[items.length - 1]?.id };
}
