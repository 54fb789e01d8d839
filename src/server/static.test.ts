import { describe, it, expect } from 'vitest';
import { join, resolve } from 'path';
import { contentTypeFor, resolveStaticPath } from './static.js';

const ROOT = resolve('/srv/public');

describe('resolveStaticPath', () => {
  it('maps a file below the root', () => {
    expect(resolveStaticPath(ROOT, '/index.html')).toBe(join(ROOT, 'index.html'));
    expect(resolveStaticPath(ROOT, '/css/site%20main.css')).toBe(join(ROOT, 'css', 'site main.css'));
  });

  it('refuses paths that climb out of the root', () => {
    expect(resolveStaticPath(ROOT, '/../secret.txt')).toBeNull();
    expect(resolveStaticPath(ROOT, '/%2e%2e/secret.txt')).toBeNull();
    expect(resolveStaticPath(ROOT, '/a/../../secret.txt')).toBeNull();
  });

  it('refuses the root itself', () => {
    expect(resolveStaticPath(ROOT, '')).toBeNull();
    expect(resolveStaticPath(ROOT, '/')).toBeNull();
  });

  it('refuses malformed escapes and NUL bytes', () => {
    expect(resolveStaticPath(ROOT, '/%E0%A4%A')).toBeNull();
    expect(resolveStaticPath(ROOT, '/index.html%00.png')).toBeNull();
  });
});

describe('contentTypeFor', () => {
  it('maps known extensions case-insensitively', () => {
    expect(contentTypeFor('index.HTML')).toBe('text/html; charset=utf-8');
    expect(contentTypeFor('app.js')).toBe('text/javascript; charset=utf-8');
  });

  it('falls back to octet-stream', () => {
    expect(contentTypeFor('archive.tar.gz')).toBe('application/octet-stream');
  });
});
