import { readFileSync } from 'fs';
import { extname, resolve, sep } from 'path';
import type { ServerResponse } from 'http';
import { json } from './http.js';

const CONTENT_TYPES: Record<string, string> = {
  '.html': 'text/html; charset=utf-8',
  '.css': 'text/css; charset=utf-8',
  '.js': 'text/javascript; charset=utf-8',
  '.json': 'application/json',
  '.svg': 'image/svg+xml',
  '.png': 'image/png',
  '.ico': 'image/x-icon',
};

/**
 * Map a request path below the static mount onto a file inside `root`.
 * Returns null for anything that would land outside it, or on the root itself.
 */
export function resolveStaticPath(root: string, relativePath: string): string | null {
  let decoded: string;
  try {
    decoded = decodeURIComponent(relativePath);
  } catch {
    return null;
  }
  if (decoded.includes('\0')) return null;

  const base = resolve(root);
  const filePath = resolve(base, '.' + (decoded.startsWith('/') ? decoded : '/' + decoded));
  if (!filePath.startsWith(base + sep)) return null;
  return filePath;
}

export function contentTypeFor(filePath: string): string {
  return CONTENT_TYPES[extname(filePath).toLowerCase()] ?? 'application/octet-stream';
}

export function serveStatic(res: ServerResponse, root: string, relativePath: string): void {
  const filePath = resolveStaticPath(root, relativePath);
  if (!filePath) {
    json(res, 404, { detail: 'Not Found' });
    return;
  }

  let body: Buffer;
  try {
    body = readFileSync(filePath);
  } catch {
    json(res, 404, { detail: 'Not Found' });
    return;
  }

  res.writeHead(200, { 'Content-Type': contentTypeFor(filePath), 'Content-Length': body.length });
  res.end(body);
}
