import type { HttpBindings } from '@hono/node-server';
import { Hono } from 'hono';

export function healthRoutes(): Hono<{ Bindings: HttpBindings }> {
  const app = new Hono<{ Bindings: HttpBindings }>();
  app.get('/health', (c) => c.json({ status: 'ok' }));
  return app;
}
