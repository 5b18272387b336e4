import type { Request, Response, NextFunction, RequestHandler } from 'express';

const ALLOWED_METHODS = 'GET, POST, OPTIONS';
const ALLOWED_HEADERS = 'Content-Type, X-Requested-With, Accept, Origin';

function setCorsHeaders(res: Response, origin: string): void {
  res.setHeader('Access-Control-Allow-Origin', origin);
  res.setHeader('Access-Control-Allow-Methods', ALLOWED_METHODS);
  res.setHeader('Access-Control-Allow-Headers', ALLOWED_HEADERS);
  res.setHeader('Access-Control-Max-Age', '86400'); // 24 hours
}

/**
 * CORS for the local front end. Requests without an Origin header
 * (same origin, curl) pass untouched.
 */
export function createCorsMiddleware(allowedOrigins: string[]): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    const origin = req.headers.origin;

    if (req.method === 'OPTIONS') {
      if (origin && allowedOrigins.includes(origin)) {
        setCorsHeaders(res, origin);
        res.status(204).end();
      } else if (origin) {
        console.warn(`[CORS] OPTIONS preflight blocked for origin: ${origin}`);
        res.status(403).json({ error: 'CORS policy: Origin not allowed' });
      } else {
        res.status(204).end();
      }
      return;
    }

    if (origin && allowedOrigins.includes(origin)) {
      setCorsHeaders(res, origin);
    } else if (origin) {
      console.warn(`[CORS] Blocked request from origin: ${origin}`);
    }

    next();
  };
}
