import { createServer, IncomingMessage, Server, ServerResponse } from 'http';
import type { ActivityRegistry } from '../activities/registry.js';
import { HttpError, RequestError } from '../errors.js';
import { CORS_HEADERS, json, parseQuery, pathSegments, readBody, redirect } from './http.js';
import { serveStatic } from './static.js';

export interface ServerOptions {
  /** Directory served under /static. */
  staticDir: string;
  /** One log line per request. Defaults to true. */
  logRequests?: boolean;
}

type RegistrationAction = 'signup' | 'unregister';

function isRegistrationAction(value: string): value is RegistrationAction {
  return value === 'signup' || value === 'unregister';
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * The participant email comes from the `email` query parameter, falling back
 * to a JSON body of the form `{ "email": "..." }`. The value is opaque: an
 * empty string is a valid email, only an absent one is rejected.
 */
async function readEmail(req: IncomingMessage): Promise<string> {
  const query = parseQuery(req.url || '');
  if (Object.hasOwn(query, 'email')) return query.email;

  const body = await readBody(req);
  if (!body.trim()) {
    throw new RequestError(422, 'Missing required field: email');
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch {
    throw new RequestError(422, 'Invalid JSON body');
  }

  if (!isRecord(parsed) || typeof parsed.email !== 'string') {
    throw new RequestError(422, 'Missing required field: email');
  }
  return parsed.email;
}

function methodNotAllowed(res: ServerResponse, allowed: string): void {
  res.setHeader('Allow', allowed);
  json(res, 405, { detail: 'Method Not Allowed' });
}

/**
 * HTTP surface over one ActivityRegistry. The registry is owned by the caller,
 * so tests can build a fresh one (or reset it) per case.
 */
export function createActivitiesServer(registry: ActivityRegistry, options: ServerOptions): Server {
  const logRequests = options.logRequests ?? true;
  const startedAt = Date.now();

  // --- Handlers ---

  function handleList(res: ServerResponse): void {
    json(res, 200, registry.list());
  }

  function handleGet(res: ServerResponse, activityName: string): void {
    json(res, 200, registry.get(activityName));
  }

  async function handleRegistration(
    req: IncomingMessage,
    res: ServerResponse,
    activityName: string,
    action: RegistrationAction,
  ): Promise<void> {
    // Unknown activities are reported before the email is looked at
    registry.get(activityName);
    const email = await readEmail(req);
    const result = action === 'signup'
      ? registry.signup(activityName, email)
      : registry.unregister(activityName, email);
    json(res, 200, result);
  }

  function handleHealth(res: ServerResponse): void {
    const uptimeMs = Date.now() - startedAt;
    json(res, 200, {
      status: 'ok',
      uptimeMs,
      activities: registry.size,
      timestamp: new Date().toISOString(),
    });
  }

  // --- Routing ---

  async function route(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const method = req.method || 'GET';
    const rawUrl = req.url || '/';

    if (method === 'OPTIONS') {
      res.writeHead(204, CORS_HEADERS);
      res.end();
      return;
    }

    const rawPath = rawUrl.split('?')[0];
    if (rawPath === '/static' || rawPath.startsWith('/static/')) {
      if (method !== 'GET') return methodNotAllowed(res, 'GET');
      serveStatic(res, options.staticDir, rawPath.slice('/static'.length));
      return;
    }

    const segments = pathSegments(rawUrl);
    const [resource, activityName, action] = segments;

    if (segments.length === 0) {
      if (method !== 'GET') return methodNotAllowed(res, 'GET');
      redirect(res, '/static/index.html');
    } else if (segments.length === 1 && resource === 'health') {
      if (method !== 'GET') return methodNotAllowed(res, 'GET');
      handleHealth(res);
    } else if (resource === 'activities' && segments.length === 1) {
      if (method !== 'GET') return methodNotAllowed(res, 'GET');
      handleList(res);
    } else if (resource === 'activities' && segments.length === 2) {
      if (method !== 'GET') return methodNotAllowed(res, 'GET');
      handleGet(res, activityName);
    } else if (resource === 'activities' && segments.length === 3 && isRegistrationAction(action)) {
      if (method !== 'POST') return methodNotAllowed(res, 'POST');
      await handleRegistration(req, res, activityName, action);
    } else {
      json(res, 404, { detail: 'Not Found' });
    }
  }

  return createServer(async (req, res) => {
    const start = Date.now();
    if (logRequests) {
      res.on('finish', () => {
        console.log(`[${new Date().toISOString()}] [Server] ${req.method} ${req.url} ${res.statusCode} ${Date.now() - start}ms`);
      });
    }

    try {
      await route(req, res);
    } catch (err) {
      if (res.headersSent) {
        console.error('[Server] Error after response started:', err);
        res.end();
        return;
      }
      if (err instanceof HttpError) {
        json(res, err.status, { detail: err.detail });
        return;
      }
      console.error('[Server] Request error:', err);
      json(res, 500, { detail: 'Internal Server Error' });
    }
  });
}
