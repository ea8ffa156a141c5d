import type { HttpBindings } from '@hono/node-server';
import type { MiddlewareHandler } from 'hono';

const LOCAL_HOSTS = new Set(['localhost', '127.0.0.1', '[::1]']);

export function isAllowedOrigin(origin: string, allowed: readonly string[]): boolean {
  if (allowed.length > 0) {
    return allowed.includes(origin);
  }
  try {
    return LOCAL_HOSTS.has(new URL(origin).hostname.toLowerCase());
  } catch {
    return false;
  }
}

/**
 * Browser callers must come from an allowed origin (loopback by default);
 * requests without an Origin header (CLI agents, curl) pass through.
 */
export function corsMiddleware(allowedOrigins: readonly string[] = []): MiddlewareHandler<{
  Bindings: HttpBindings;
}> {
  return async (c, next) => {
    const requestOrigin = c.req.header('Origin');
    if (requestOrigin) {
      if (!isAllowedOrigin(requestOrigin, allowedOrigins)) {
        return c.json(
          {
            jsonrpc: '2.0',
            error: { code: -32000, message: `Invalid origin: ${requestOrigin}` },
            id: null,
          },
          403,
        );
      }
      c.header('Access-Control-Allow-Origin', requestOrigin);
      c.header('Vary', 'Origin');
    }
    c.header('Access-Control-Allow-Methods', 'GET, POST, DELETE, OPTIONS');
    c.header(
      'Access-Control-Allow-Headers',
      'Content-Type, Mcp-Session-Id, Mcp-Protocol-Version',
    );
    c.header('Access-Control-Expose-Headers', 'Mcp-Session-Id');

    if (c.req.method === 'OPTIONS') {
      return c.body(null, 204);
    }

    await next();
  };
}
