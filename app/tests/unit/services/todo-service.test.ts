import { describe, it, expect, beforeEach } from 'vitest';
import { ApiError } from '../../../src/errors.js';
import { TodoService, parseDueAt } from '../../../src/services/todo-service.js';
import { UnknownOwnerError } from '../../../src/types/todo.js';
import type { NewTodo, Todo } from '../../../src/types/todo.js';
import { MemoryTodoStore } from '../../fixtures/memory-todo-store.js';

const ALICE = 'alice-id';
const BOB = 'bob-id';

async function expectApiError(promise: Promise<unknown>, status: number, code: string, message: string) {
  const err = await promise.catch((e: unknown) => e);
  expect(err).toBeInstanceOf(ApiError);
  if (err instanceof ApiError) {
    expect({ status: err.status, code: err.code, message: err.message }).toEqual({ status, code, message });
  }
}

describe('parseDueAt', () => {
  it('accepts RFC 3339 timestamps with Z or an offset', () => {
    expect(parseDueAt('2026-03-01T09:00:00Z').toISOString()).toBe('2026-03-01T09:00:00.000Z');
    expect(parseDueAt('2026-03-01T18:00:00+09:00').toISOString()).toBe('2026-03-01T09:00:00.000Z');
  });

  it.each(['tomorrow', '2026-03-01', '2026-03-01T09:00:00', ''])('rejects %j', (raw) => {
    expect(() => parseDueAt(raw)).toThrow('due_at must be an RFC 3339 timestamp');
  });
});

describe('TodoService', () => {
  let store: MemoryTodoStore;
  let service: TodoService;

  beforeEach(() => {
    store = new MemoryTodoStore();
    service = new TodoService(store);
  });

  describe('create()', () => {
    it('creates a pending todo', async () => {
      const todo = await service.create(ALICE, {
        title: 'Write report',
        description: 'Q1 numbers',
        dueAt: '2026-03-01T09:00:00Z',
      });

      expect(todo).toMatchObject({
        userId: ALICE,
        title: 'Write report',
        description: 'Q1 numbers',
        status: 'pending',
        dueAt: new Date('2026-03-01T09:00:00Z'),
      });
    });

    it('defaults description and due date', async () => {
      const todo = await service.create(ALICE, { title: 'Call mom', dueAt: null });
      expect(todo.description).toBe('');
      expect(todo.dueAt).toBeNull();
    });

    it('requires a title', async () => {
      await expectApiError(service.create(ALICE, { title: '' }), 400, 'INVALID_INPUT', 'title is required');
    });

    it('rejects a malformed due date', async () => {
      await expectApiError(
        service.create(ALICE, { title: 'x', dueAt: 'next week' }),
        400,
        'INVALID_INPUT',
        'due_at must be an RFC 3339 timestamp',
      );
    });
    it('rejects an empty due date rather than dropping it', async () => {
      await expectApiError(
        service.create(ALICE, { title: 'x', dueAt: '' }),
        400,
        'INVALID_INPUT',
        'due_at must be an RFC 3339 timestamp',
      );
      await expect(service.list(ALICE, {})).resolves.toEqual({ todos: [] });
    });

    it('reports an owner the store does not know as unauthorized', async () => {
      class OwnerlessStore extends MemoryTodoStore {
        override async create(todo: NewTodo): Promise<Todo> {
          throw new UnknownOwnerError(todo.userId);
        }
      }
      const ownerless = new TodoService(new OwnerlessStore());

      await expectApiError(ownerless.create('u1', { title: 'x' }), 401, 'UNAUTHORIZED', 'unknown user');
    });
  });

  describe('getById()', () => {
    it("hides another user's todo", async () => {
      const todo = await service.create(ALICE, { title: 'Private' });
      await expectApiError(service.getById(BOB, todo.id), 404, 'NOT_FOUND', 'todo not found');
    });
  });

  describe('update()', () => {
    it('changes only the supplied fields', async () => {
      const todo = await service.create(ALICE, { title: 'Draft', description: 'keep me' });

      const updated = await service.update(ALICE, todo.id, { title: 'Final' });

      expect(updated.title).toBe('Final');
      expect(updated.description).toBe('keep me');
      expect(updated.status).toBe('pending');
    });

    it('sets and clears the due date', async () => {
      const todo = await service.create(ALICE, { title: 'Due soon' });

      const withDue = await service.update(ALICE, todo.id, { dueAt: '2026-04-01T00:00:00Z' });
      expect(withDue.dueAt).toEqual(new Date('2026-04-01T00:00:00Z'));

      const cleared = await service.update(ALICE, todo.id, { dueAt: null });
      expect(cleared.dueAt).toBeNull();
    });

    it('rejects an empty title', async () => {
      const todo = await service.create(ALICE, { title: 'Draft' });
      await expectApiError(service.update(ALICE, todo.id, { title: '' }), 400, 'INVALID_INPUT', 'title cannot be empty');
    });

    it("cannot touch another user's todo", async () => {
      const todo = await service.create(ALICE, { title: 'Mine' });
      await expectApiError(service.update(BOB, todo.id, { title: 'Yours' }), 404, 'NOT_FOUND', 'todo not found');
      expect((await service.getById(ALICE, todo.id)).title).toBe('Mine');
    });
  });

  describe('updateStatus()', () => {
    it('moves a todo between pending and completed', async () => {
      const todo = await service.create(ALICE, { title: 'Ship it' });

      expect((await service.updateStatus(ALICE, todo.id, 'completed')).status).toBe('completed');
      expect((await service.updateStatus(ALICE, todo.id, 'pending')).status).toBe('pending');
    });

    it('rejects an unknown status before reading the todo', async () => {
      await expectApiError(
        service.updateStatus(ALICE, 'missing', 'archived'),
        400,
        'INVALID_INPUT',
        "status must be 'pending' or 'completed'",
      );
    });
  });

  describe('delete()', () => {
    it('removes the todo', async () => {
      const todo = await service.create(ALICE, { title: 'Temp' });
      await service.delete(ALICE, todo.id);
      await expectApiError(service.getById(ALICE, todo.id), 404, 'NOT_FOUND', 'todo not found');
    });

    it("reports not found for another user's todo", async () => {
      const todo = await service.create(ALICE, { title: 'Temp' });
      await expectApiError(service.delete(BOB, todo.id), 404, 'NOT_FOUND', 'todo not found');
    });
  });

  describe('list()', () => {
    it('clamps the limit before reaching the store', async () => {
      await service.list(ALICE, { limit: 1000 });
      await service.list(ALICE, {});
      await service.list(ALICE, { limit: 5, status: 'completed', cursor: 'abc' });

      expect(store.listCalls).toEqual([
        { userId: ALICE, status: undefined, cursor: undefined, limit: 20 },
        { userId: ALICE, status: undefined, cursor: undefined, limit: 20 },
        { userId: ALICE, status: 'completed', cursor: 'abc', limit: 5 },
      ]);
    });

    it("never returns another user's todos", async () => {
      await service.create(ALICE, { title: 'A1' });
      await service.create(BOB, { title: 'B1' });
      await service.create(ALICE, { title: 'A2' });

      const result = await service.list(BOB, {});
      expect(result.todos.map((t) => t.title)).toEqual(['B1']);
    });

    it('filters by status', async () => {
      const done = await service.create(ALICE, { title: 'Done' });
      await service.create(ALICE, { title: 'Open' });
      await service.updateStatus(ALICE, done.id, 'completed');

      const result = await service.list(ALICE, { status: 'completed' });
      expect(result.todos.map((t) => t.title)).toEqual(['Done']);
    });
  });
});
