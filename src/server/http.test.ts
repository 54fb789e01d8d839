import { describe, it, expect } from 'vitest';
import { parseQuery, pathSegments } from './http.js';
import { RequestError } from '../errors.js';

describe('parseQuery', () => {
  it('returns an empty object without a query string', () => {
    expect(parseQuery('/activities')).toEqual({});
  });

  it('decodes percent escapes and plus signs', () => {
    expect(parseQuery('/x?email=new%40mergington.edu&name=Chess+Club'))
      .toEqual({ email: 'new@mergington.edu', name: 'Chess Club' });
  });

  it('keeps everything after the first "=" in the value', () => {
    expect(parseQuery('/x?token=a=b')).toEqual({ token: 'a=b' });
  });

  it('maps a bare key to the empty string and skips empty pairs', () => {
    expect(parseQuery('/x?flag&&email=')).toEqual({ flag: '', email: '' });
  });

  it('lets the last occurrence win', () => {
    expect(parseQuery('/x?email=a&email=b')).toEqual({ email: 'b' });
  });

  it('throws a 400 RequestError on malformed escapes', () => {
    try {
      parseQuery('/x?email=%E0%A4%A');
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(RequestError);
      if (err instanceof RequestError) expect(err.status).toBe(400);
    }
  });
});

describe('pathSegments', () => {
  it('splits and decodes path segments, ignoring the query', () => {
    expect(pathSegments('/activities/Chess%20Club/signup?email=a')).toEqual(['activities', 'Chess Club', 'signup']);
  });

  it('ignores leading, trailing and doubled slashes', () => {
    expect(pathSegments('//activities/')).toEqual(['activities']);
    expect(pathSegments('/')).toEqual([]);
  });

  it('keeps an encoded slash inside one segment', () => {
    expect(pathSegments('/activities/Arts%2FCrafts')).toEqual(['activities', 'Arts/Crafts']);
  });

  it('throws a 400 RequestError on malformed escapes', () => {
    expect(() => pathSegments('/activities/%ZZ')).toThrow('Malformed request path');
  });
});
