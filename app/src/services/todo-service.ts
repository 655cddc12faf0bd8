/**
 * TodoService — validation and business rules for todos.
 *
 * Input problems surface as ApiError(400, INVALID_INPUT); missing rows
 * (including rows owned by another user) as ApiError(404, NOT_FOUND); an
 * owner the store does not know as ApiError(401, UNAUTHORIZED). Other store
 * failures propagate unchanged and end up as 500s.
 */
import { z } from 'zod';
import { ApiError } from '../errors.js';
import { clampLimit } from '../db/pagination.js';
import { isTodoStatus, UnknownOwnerError } from '../types/todo.js';
import type { Todo, TodoListResult, TodoStatus, TodoStore } from '../types/todo.js';

export interface CreateTodoInput {
  title: string;
  description?: string;
  /** RFC 3339 timestamp with offset. */
  dueAt?: string | null;
}

export interface UpdateTodoInput {
  title?: string;
  description?: string;
  /** RFC 3339 timestamp; null clears the due date, undefined leaves it. */
  dueAt?: string | null;
}

export interface ListTodosInput {
  status?: TodoStatus;
  cursor?: string;
  limit?: number;
}

const Rfc3339Schema = z.string().datetime({ offset: true });

/** Parse an RFC 3339 timestamp, rejecting anything without an explicit offset. */
export function parseDueAt(raw: string): Date {
  if (!Rfc3339Schema.safeParse(raw).success) {
    throw ApiError.invalidInput('due_at must be an RFC 3339 timestamp');
  }
  return new Date(raw);
}

export class TodoService {
  constructor(private readonly store: TodoStore) {}

  async create(userId: string, input: CreateTodoInput): Promise<Todo> {
    if (input.title === '') {
      throw ApiError.invalidInput('title is required');
    }

    const dueAt = input.dueAt === undefined || input.dueAt === null ? null : parseDueAt(input.dueAt);

    try {
      return await this.store.create({
        userId,
        title: input.title,
        description: input.description ?? '',
        status: 'pending',
        dueAt,
      });
    } catch (err) {
      if (err instanceof UnknownOwnerError) throw ApiError.unauthorized('unknown user');
      throw err;
    }
  }

  async getById(userId: string, id: string): Promise<Todo> {
    const todo = await this.store.getById(userId, id);
    if (!todo) throw ApiError.notFound('todo not found');
    return todo;
  }

  async update(userId: string, id: string, input: UpdateTodoInput): Promise<Todo> {
    const todo = await this.getById(userId, id);

    if (input.title !== undefined) {
      if (input.title === '') {
        throw ApiError.invalidInput('title cannot be empty');
      }
      todo.title = input.title;
    }
    if (input.description !== undefined) {
      todo.description = input.description;
    }
    if (input.dueAt === null) {
      todo.dueAt = null;
    } else if (input.dueAt !== undefined) {
      todo.dueAt = parseDueAt(input.dueAt);
    }

    return this.save(todo);
  }

  async updateStatus(userId: string, id: string, status: string): Promise<Todo> {
    if (!isTodoStatus(status)) {
      throw ApiError.invalidInput("status must be 'pending' or 'completed'");
    }
    const todo = await this.getById(userId, id);
    todo.status = status;
    return this.save(todo);
  }

  async delete(userId: string, id: string): Promise<void> {
    const deleted = await this.store.delete(userId, id);
    if (!deleted) throw ApiError.notFound('todo not found');
  }

  async list(userId: string, input: ListTodosInput): Promise<TodoListResult> {
    return this.store.list({
      userId,
      status: input.status,
      cursor: input.cursor,
      limit: clampLimit(input.limit),
    });
  }

  private async save(todo: Todo): Promise<Todo> {
    const updated = await this.store.update(todo);
    // Deleted between read and write.
    if (!updated) throw ApiError.notFound('todo not found');
    return updated;
  }
}
