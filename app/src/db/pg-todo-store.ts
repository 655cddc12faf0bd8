/**
 * PostgresTodoStore — PostgreSQL-backed implementation of TodoStore.
 *
 * Every statement filters on user_id, so a row owned by another user reads
 * as missing. Both key columns are uuids: an owner or todo id in any other
 * form matches nothing and is answered without a query.
 */
import type pg from 'pg';
import { isTodoStatus, UnknownOwnerError } from '../types/todo.js';
import type { NewTodo, Todo, TodoListParams, TodoListResult, TodoStore } from '../types/todo.js';
import { buildTodoListQuery, clampLimit, isUuid, takePage, TODO_COLUMNS } from './pagination.js';

export interface TodoRow {
  id: string;
  user_id: string;
  title: string;
  description: string;
  status: string;
  due_at: Date | null;
  created_at: Date;
  updated_at: Date;
}

export function rowToTodo(row: TodoRow): Todo {
  if (!isTodoStatus(row.status)) {
    throw new Error(`unexpected todo status in database: ${row.status}`);
  }
  return {
    id: row.id,
    userId: row.user_id,
    title: row.title,
    description: row.description,
    status: row.status,
    dueAt: row.due_at,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

const FOREIGN_KEY_VIOLATION = '23503';

function isForeignKeyViolation(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === FOREIGN_KEY_VIOLATION;
}

export class PostgresTodoStore implements TodoStore {
  constructor(private readonly pool: pg.Pool) {}

  async create(todo: NewTodo): Promise<Todo> {
    if (!isUuid(todo.userId)) throw new UnknownOwnerError(todo.userId);

    let result: pg.QueryResult<TodoRow>;
    try {
      result = await this.pool.query<TodoRow>(
        `INSERT INTO todos (user_id, title, description, status, due_at)
         VALUES ($1, $2, $3, $4, $5)
         RETURNING ${TODO_COLUMNS}`,
        [todo.userId, todo.title, todo.description, todo.status, todo.dueAt],
      );
    } catch (err) {
      if (isForeignKeyViolation(err)) throw new UnknownOwnerError(todo.userId);
      throw err;
    }
    const row = result.rows[0];
    if (!row) throw new Error('insert into todos returned no row');
    return rowToTodo(row);
  }

  async getById(userId: string, id: string): Promise<Todo | undefined> {
    if (!isUuid(userId) || !isUuid(id)) return undefined;
    const result = await this.pool.query<TodoRow>(
      `SELECT ${TODO_COLUMNS} FROM todos WHERE id = $1 AND user_id = $2`,
      [id, userId],
    );
    const row = result.rows[0];
    return row ? rowToTodo(row) : undefined;
  }

  async update(todo: Todo): Promise<Todo | undefined> {
    if (!isUuid(todo.userId) || !isUuid(todo.id)) return undefined;
    const result = await this.pool.query<TodoRow>(
      `UPDATE todos
       SET title = $1, description = $2, status = $3, due_at = $4, updated_at = now()
       WHERE id = $5 AND user_id = $6
       RETURNING ${TODO_COLUMNS}`,
      [todo.title, todo.description, todo.status, todo.dueAt, todo.id, todo.userId],
    );
    const row = result.rows[0];
    return row ? rowToTodo(row) : undefined;
  }

  async delete(userId: string, id: string): Promise<boolean> {
    if (!isUuid(userId) || !isUuid(id)) return false;
    const result = await this.pool.query(
      'DELETE FROM todos WHERE id = $1 AND user_id = $2',
      [id, userId],
    );
    return (result.rowCount ?? 0) > 0;
  }

  async list(params: TodoListParams): Promise<TodoListResult> {
    if (!isUuid(params.userId) || (params.cursor && !isUuid(params.cursor))) {
      return { todos: [] };
    }

    const limit = clampLimit(params.limit);
    const query = buildTodoListQuery({ ...params, limit });
    const result = await this.pool.query<TodoRow>(query.text, query.values);
    const page = takePage(result.rows, limit);

    const todos = page.items.map(rowToTodo);
    return page.nextCursor ? { todos, nextCursor: page.nextCursor } : { todos };
  }
}
