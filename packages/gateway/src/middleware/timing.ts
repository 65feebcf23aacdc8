/**
 * Request timing middleware
 */

import { createMiddleware } from 'hono/factory';

export const timing = createMiddleware(async (c, next) => {
  const start = performance.now();
  c.set('startTime', start);

  await next();

  c.header('X-Response-Time', `${(performance.now() - start).toFixed(2)}ms`);
});
