import { Hono } from 'hono';
import type { Context } from 'hono';
import { z } from 'zod';
import { errorBody } from '../errors.js';
import { clampLimit } from '../db/pagination.js';
import { getUserId } from '../middleware/auth-gate.js';
import type { TodoService } from '../services/todo-service.js';
import { isTodoStatus, toTodoResponse } from '../types/todo.js';
import type { TodoListResponse } from '../types/todo.js';
import { methodNotAllowed } from '../utils/error-handler.js';

// Runtime body validation. A missing title or status is left to the service
// rules so it reports INVALID_INPUT rather than INVALID_JSON.
const CreateTodoSchema = z.object({
  title: z.string().default(''),
  description: z.string().optional(),
  due_at: z.string().nullable().optional(),
});

const UpdateTodoSchema = z.object({
  title: z.string().optional(),
  description: z.string().optional(),
  due_at: z.string().nullable().optional(),
});

const UpdateStatusSchema = z.object({
  status: z.string().default(''),
});

async function readJson(c: Context): Promise<unknown> {
  return c.req.json().catch(() => null);
}

function invalidJson(c: Context) {
  return c.json(errorBody('INVALID_JSON', 'invalid request body'), 400);
}

/**
 * Todo routes, mounted at /api/v1/todos behind the auth gate. Every
 * operation is scoped to the authenticated user.
 */
export function createTodoRoutes(service: TodoService): Hono {
  const app = new Hono();

  /**
   * POST / — create a todo (status starts as pending)
   */
  app.post('/', async (c) => {
    const parsed = CreateTodoSchema.safeParse(await readJson(c));
    if (!parsed.success) return invalidJson(c);

    const todo = await service.create(getUserId(c), {
      title: parsed.data.title,
      description: parsed.data.description,
      dueAt: parsed.data.due_at,
    });
    return c.json(toTodoResponse(todo), 201);
  });

  /**
   * GET / — list todos, newest first, with cursor pagination
   *
   * Query: status (pending|completed), cursor (id of the last item seen),
   * limit (1-100, default 20)
   */
  app.get('/', async (c) => {
    const status = c.req.query('status');
    if (status && !isTodoStatus(status)) {
      return c.json(
        errorBody('INVALID_STATUS', "status must be 'pending' or 'completed'"),
        400,
      );
    }

    const result = await service.list(getUserId(c), {
      status: status && isTodoStatus(status) ? status : undefined,
      cursor: c.req.query('cursor') || undefined,
      limit: clampLimit(c.req.query('limit')),
    });

    const body: TodoListResponse = { todos: result.todos.map(toTodoResponse) };
    if (result.nextCursor) body.next_cursor = result.nextCursor;
    return c.json(body);
  });

  app.all('/', methodNotAllowed);

  app.get('/:id', async (c) => {
    const todo = await service.getById(getUserId(c), c.req.param('id'));
    return c.json(toTodoResponse(todo));
  });

  /**
   * PUT /:id — partial update of title, description and due_at
   */
  app.put('/:id', async (c) => {
    const parsed = UpdateTodoSchema.safeParse(await readJson(c));
    if (!parsed.success) return invalidJson(c);

    const todo = await service.update(getUserId(c), c.req.param('id'), {
      title: parsed.data.title,
      description: parsed.data.description,
      dueAt: parsed.data.due_at,
    });
    return c.json(toTodoResponse(todo));
  });

  app.delete('/:id', async (c) => {
    await service.delete(getUserId(c), c.req.param('id'));
    return c.body(null, 204);
  });

  app.all('/:id', methodNotAllowed);

  app.patch('/:id/status', async (c) => {
    const parsed = UpdateStatusSchema.safeParse(await readJson(c));
    if (!parsed.success) return invalidJson(c);

    const todo = await service.updateStatus(getUserId(c), c.req.param('id'), parsed.data.status);
    return c.json(toTodoResponse(todo));
  });

  app.all('/:id/status', methodNotAllowed);

  return app;
}
