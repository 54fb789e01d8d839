// --- HTTP helpers ---

import type { IncomingMessage, ServerResponse } from 'http';
import { RequestError } from '../errors.js';

export const MAX_BODY_BYTES = 16 * 1024; // 16 KB

export const CORS_HEADERS = {
  'Access-Control-Allow-Origin': '*',
  'Access-Control-Allow-Methods': 'GET, POST, OPTIONS',
  'Access-Control-Allow-Headers': 'Content-Type',
};

export function readBody(req: IncomingMessage): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let totalBytes = 0;
    // Oversized bodies are drained, not buffered, so the 413 can still be written
    req.on('data', (chunk: Buffer) => {
      totalBytes += chunk.length;
      if (totalBytes <= MAX_BODY_BYTES) chunks.push(chunk);
    });
    req.on('end', () => {
      if (totalBytes > MAX_BODY_BYTES) {
        reject(new RequestError(413, 'Request body too large'));
        return;
      }
      resolve(Buffer.concat(chunks).toString('utf-8'));
    });
    req.on('error', reject);
  });
}

export function json(res: ServerResponse, status: number, data: unknown): void {
  res.writeHead(status, { 'Content-Type': 'application/json', 'Access-Control-Allow-Origin': '*' });
  res.end(JSON.stringify(data));
}

export function redirect(res: ServerResponse, location: string): void {
  res.writeHead(307, { Location: location });
  res.end();
}

function decodeFormComponent(value: string): string {
  try {
    return decodeURIComponent(value.replace(/\+/g, ' '));
  } catch {
    throw new RequestError(400, 'Malformed query string');
  }
}

/**
 * Form-style query parsing: `+` is a space, later keys win, a key without
 * `=` maps to the empty string.
 */
export function parseQuery(url: string): Record<string, string> {
  const idx = url.indexOf('?');
  if (idx === -1) return {};
  const params: Record<string, string> = {};
  for (const pair of url.slice(idx + 1).split('&')) {
    if (!pair) continue;
    const eq = pair.indexOf('=');
    const k = eq === -1 ? pair : pair.slice(0, eq);
    const v = eq === -1 ? '' : pair.slice(eq + 1);
    if (k) params[decodeFormComponent(k)] = decodeFormComponent(v);
  }
  return params;
}

/** Split a request path into percent-decoded segments. */
export function pathSegments(url: string): string[] {
  const pathname = url.split('?')[0];
  try {
    return pathname.split('/').filter(s => s !== '').map(s => decodeURIComponent(s));
  } catch {
    throw new RequestError(400, 'Malformed request path');
  }
}
