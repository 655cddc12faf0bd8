import { z } from 'zod';

export const TODO_STATUSES = ['pending', 'completed'] as const;

export type TodoStatus = (typeof TODO_STATUSES)[number];

export const TodoStatusSchema = z.enum(TODO_STATUSES);

export function isTodoStatus(value: string): value is TodoStatus {
  return TodoStatusSchema.safeParse(value).success;
}

export interface Todo {
  id: string;
  userId: string;
  title: string;
  description: string;
  status: TodoStatus;
  dueAt: Date | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface NewTodo {
  userId: string;
  title: string;
  description: string;
  status: TodoStatus;
  dueAt: Date | null;
}

export interface TodoListParams {
  userId: string;
  status?: TodoStatus;
  /** Id of the last item of the previous page. */
  cursor?: string;
  limit: number;
}

export interface TodoListResult {
  todos: Todo[];
  /** Present only when more items follow. */
  nextCursor?: string;
}

/** The owning user id does not name a registered user. */
export class UnknownOwnerError extends Error {
  readonly userId: string;

  constructor(userId: string) {
    super(`no user with id "${userId}"`);
    this.name = 'UnknownOwnerError';
    this.userId = userId;
  }
}

/**
 * Persistence port for todos. Every operation is scoped to the owning user;
 * an owner id the store cannot hold reads as owning nothing.
 */
export interface TodoStore {
  /** @throws UnknownOwnerError when `todo.userId` is not a registered user */
  create(todo: NewTodo): Promise<Todo>;
  getById(userId: string, id: string): Promise<Todo | undefined>;
  update(todo: Todo): Promise<Todo | undefined>;
  delete(userId: string, id: string): Promise<boolean>;
  list(params: TodoListParams): Promise<TodoListResult>;
}

export interface User {
  id: string;
  externalSubject: string;
  email: string;
  nickname: string;
  profileImageUrl: string;
  createdAt: Date;
  updatedAt: Date;
}

/** Wire shape of a todo. */
export interface TodoResponse {
  id: string;
  user_id: string;
  title: string;
  description: string;
  status: TodoStatus;
  due_at?: string;
  created_at: string;
  updated_at: string;
}

export interface TodoListResponse {
  todos: TodoResponse[];
  next_cursor?: string;
}

export function toTodoResponse(todo: Todo): TodoResponse {
  const res: TodoResponse = {
    id: todo.id,
    user_id: todo.userId,
    title: todo.title,
    description: todo.description,
    status: todo.status,
    created_at: todo.createdAt.toISOString(),
    updated_at: todo.updatedAt.toISOString(),
  };
  if (todo.dueAt) res.due_at = todo.dueAt.toISOString();
  return res;
}
