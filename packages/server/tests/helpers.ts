import type { Request, Response, Router } from 'express';

interface RouteLayer {
  route?: {
    path: string;
    methods: Record<string, boolean>;
    stack: Array<{ handle: (req: Request, res: Response) => unknown }>;
  };
}

/**
 * Invoke an Express route handler directly (without starting a server).
 * Finds the matching route on the router's internal stack and calls it.
 */
export async function callRoute(
  router: Router,
  method: string,
  path: string,
  body: unknown,
): Promise<{ status: number; json: Record<string, unknown> }> {
  let statusCode = 200;
  let jsonBody: Record<string, unknown> = {};

  const req = { method: method.toUpperCase(), url: path, body } as Request;
  const res = {
    status(code: number) {
      statusCode = code;
      return this;
    },
    json(data: Record<string, unknown>) {
      jsonBody = data;
    },
  } as unknown as Response;

  const stack: RouteLayer[] = router.stack;
  const route = stack.find(
    l => l.route?.path === path && l.route?.methods[method.toLowerCase()],
  )?.route;
  if (!route) throw new Error(`No route found: ${method} ${path}`);

  // Call the handler (last in the stack)
  const handler = route.stack[route.stack.length - 1]?.handle;
  if (!handler) throw new Error(`Route has no handler: ${method} ${path}`);

  await handler(req, res);
  return { status: statusCode, json: jsonBody };
}

/** Stored hash written by the original framework for password "In2Egypt!" (10000 iterations) */
export const LEGACY_HASH =
  'AQAAAAEAACcQAAAAEO4k5r1SgFuCYAS8xfu/Mnu5iZUqh+DgSRU4IyJpD+mVo4KdbI1BwiF3KcY1V6AapQ==';
export const LEGACY_PASSWORD = 'In2Egypt!';
