/**
 * Route table: binds each HTTP endpoint to a TaskService use case.
 */

import type { TaskService } from '../core/tasks/task-service.js';
import { Router } from './router.js';
import type { RouteContext } from './router.js';
import {
  changeParentBodySchema,
  createTaskBodySchema,
  createTaskQuerySchema,
  deleteTaskSchema,
  parseInput,
  taskIdParamSchema,
  toggleQuerySchema,
  updateTaskBodySchema,
} from './schemas.js';
import type { ChangeParentBody, CreateTaskBody, UpdateTaskBody } from './schemas.js';

function queryObject(ctx: RouteContext): Record<string, string> {
  return Object.fromEntries(ctx.query);
}

function idParam(ctx: RouteContext): number {
  return parseInput(taskIdParamSchema, ctx.params['id'], 'task id');
}

export function createTaskRouter(service: TaskService): Router {
  const router = new Router();

  router.get('/health', () => ({ status: 200, body: { status: 'ok' } }));

  router.get('/tasks', () => ({ status: 200, body: service.listRoots() }));

  router.get('/tasks/:id', (ctx) => ({ status: 200, body: service.show(idParam(ctx)) }));

  router.post('/tasks', (ctx) => {
    const query = parseInput(createTaskQuerySchema, queryObject(ctx), 'query');
    const body: CreateTaskBody = parseInput(createTaskBodySchema, ctx.body, 'task');
    return { status: 201, body: service.create(body, query.parent ?? null) };
  });

  router.patch('/tasks/:id', (ctx) => {
    const id = idParam(ctx);
    const body: UpdateTaskBody = parseInput(updateTaskBodySchema, ctx.body, 'task update');
    return { status: 200, body: service.update(id, body) };
  });

  // id comes from the query string, falling back to the JSON body
  router.delete('/tasks', (ctx) => {
    const source = ctx.query.has('id') ? queryObject(ctx) : ctx.body ?? {};
    const { id } = parseInput(deleteTaskSchema, source, 'delete request');
    return { status: 200, body: service.delete(id) };
  });

  router.post('/tasks/:id/toggle', (ctx) => {
    const id = idParam(ctx);
    // with_childs is validated only; activation always cascades
    parseInput(toggleQuerySchema, queryObject(ctx), 'query');
    return { status: 200, body: service.toggle(id) };
  });

  router.post('/tasks/:id/change-parent', (ctx) => {
    const id = idParam(ctx);
    const body: ChangeParentBody = parseInput(changeParentBodySchema, ctx.body ?? {}, 'change-parent request');
    return { status: 200, body: service.changeParent(id, body.parent_id ?? null) };
  });

  return router;
}
