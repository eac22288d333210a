import type { Context, MiddlewareHandler, Next } from "hono";

/**
 * CORS middleware for Hono that properly handles preflight requests
 * and sets appropriate CORS headers for all responses
 */
export function createCorsMiddleware(allowedOrigins: readonly string[]): MiddlewareHandler {
  return async (c: Context, next: Next) => {
    // Get the origin from the request headers
    const origin = c.req.header("Origin");

    if (origin && allowedOrigins.includes(origin)) {
      c.header("Access-Control-Allow-Origin", origin);
      c.header("Access-Control-Allow-Credentials", "true");
      c.header("Vary", "Origin");
    } else {
      c.header("Access-Control-Allow-Origin", "*"); // Fallback to allow any origin
    }

    c.header("Access-Control-Allow-Methods", "GET, POST, OPTIONS");
    c.header(
      "Access-Control-Allow-Headers",
      "Content-Type, Authorization, Accept, X-Requested-With, Origin"
    );
    c.header("Access-Control-Max-Age", "86400"); // 24 hours

    // Handle preflight OPTIONS requests
    if (c.req.method === "OPTIONS") {
      return c.body(null, 204);
    }

    await next();
  };
}
