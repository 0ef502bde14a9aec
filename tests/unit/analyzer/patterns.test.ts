import { describe, it, expect } from 'vitest';
import {
  escapeRegExp,
  pathToPattern,
  buildPatternSource,
  compileEndpointPatterns,
  compilePatternTable,
} from '../../../src/analyzer/patterns.js';
import { matchContent } from '../../../src/analyzer/scanner.js';
import { createEndpoint, formatEndpoint } from '../../../src/openapi/endpoints.js';
import type { HttpMethod } from '../../../src/types/index.js';
import { createRecordingLogger } from '../../helpers/logger.js';

function countMatches(method: HttpMethod, path: string, content: string): number {
  const endpoint = createEndpoint(path, method);
  const matches = matchContent(content, compileEndpointPatterns(endpoint));
  return matches.reduce((sum, m) => sum + m.count, 0);
}

describe('Pattern compiler', () => {
  describe('escapeRegExp', () => {
    it('should escape every regex metacharacter', () => {
      const escaped = escapeRegExp('/a.b*c+d?e^f$g{h}i(j)k|l[m]n\\o');

      expect(new RegExp(`^${escaped}$`).test('/a.b*c+d?e^f$g{h}i(j)k|l[m]n\\o')).toBe(true);
    });
  });

  describe('pathToPattern', () => {
    it('should replace each placeholder with the parameter fragment', () => {
      expect(pathToPattern('/users/{id}/posts/{postId}')).toBe('/users/[^/]+/posts/[^/]+');
    });

    it('should escape literal segments', () => {
      expect(pathToPattern('/v1.0/items')).toBe('/v1\\.0/items');
    });

    it('should accept a custom parameter fragment', () => {
      expect(pathToPattern('/a/{id}', '\\d+')).toBe('/a/\\d+');
    });
  });

  describe('buildPatternSource', () => {
    it('should build the loose variant from the literal path', () => {
      const source = buildPatternSource(createEndpoint('/users', 'GET'), 'loose', 'upper');

      expect(source).toBe('GET\\s*\\(\\s*[\'"`](/users)[\'"`]');
    });

    it('should lowercase the method token for lowercase variants', () => {
      const source = buildPatternSource(createEndpoint('/users', 'DELETE'), 'loose', 'lower');

      expect(source.startsWith('delete\\s*')).toBe(true);
    });
  });

  describe('compileEndpointPatterns', () => {
    it('should produce the family in a fixed order with global regexes', () => {
      const entries = compileEndpointPatterns(createEndpoint('/users', 'GET'));

      expect(entries.map(e => `${e.methodCase}:${e.variant}`)).toEqual([
        'upper:prefixed-literal',
        'upper:template',
        'lower:prefixed-literal',
        'lower:template',
        'lower:loose',
        'upper:loose',
      ]);
      expect(entries.every(e => e.regex.flags === 'g')).toBe(true);
    });
  });

  describe('idiom coverage', () => {
    it('should match a templated endpoint called with a concrete value', () => {
      expect(countMatches('GET', '/users/{id}', 'GET("/users/42")')).toBe(1);
    });

    it('should not match a different method on the same path', () => {
      expect(countMatches('GET', '/orders', 'POST("/orders")')).toBe(0);
    });

    it('should accept single, double and backtick quotes', () => {
      expect(countMatches('GET', '/a', "api.get('/a')")).toBe(2);
      expect(countMatches('GET', '/a', 'api.get("/a")')).toBe(2);
      expect(countMatches('GET', '/a', 'api.get(`/a`)')).toBe(2);
    });

    it('should tolerate whitespace inside the call', () => {
      expect(countMatches('GET', '/a', "GET ( '/a' )")).toBe(2);
    });

    it('should match calls with further arguments through the loose variant', () => {
      expect(countMatches('POST', '/orders', "api.post('/orders', payload)")).toBe(1);
    });

    it('should match a path behind a base path prefix', () => {
      expect(countMatches('GET', '/orders', 'client.get("/v2/orders")')).toBe(1);
    });

    it('should not let a placeholder span a path separator', () => {
      expect(countMatches('GET', '/users/{id}', "GET('/users/1/posts')")).toBe(0);
    });

    it('should treat metacharacters in paths literally', () => {
      expect(countMatches('GET', '/files/report.pdf', "get('/files/reportXpdf')")).toBe(0);
      expect(countMatches('GET', '/files/report.pdf', "get('/files/report.pdf')")).toBe(2);
    });

    it('should count every occurrence in the content', () => {
      const content = "api.get('/a');\napi.get('/a');\napi.get('/a');";

      expect(countMatches('GET', '/a', content)).toBe(6);
    });
  });

  describe('compilePatternTable', () => {
    it('should compile six entries per endpoint in endpoint order', () => {
      const endpoints = [createEndpoint('/a', 'GET'), createEndpoint('/b', 'POST')];

      const table = compilePatternTable(endpoints);

      expect(table.entries).toHaveLength(12);
      expect(table.entries.slice(0, 6).every(e => e.endpoint === endpoints[0])).toBe(true);
      expect(table.entries.slice(6).every(e => e.endpoint === endpoints[1])).toBe(true);
      expect(table.skipped).toEqual([]);
    });

    it('should skip only the endpoint whose patterns fail to compile', () => {
      const logger = createRecordingLogger();
      const templated = createEndpoint('/users/{id}', 'GET');
      const plain = createEndpoint('/health', 'GET');

      const table = compilePatternTable([templated, plain], { paramPattern: '(', logger });

      expect(table.entries).toHaveLength(6);
      expect(table.entries.every(e => e.endpoint === plain)).toBe(true);
      expect(table.skipped.map(s => formatEndpoint(s.endpoint))).toEqual(['GET /users/{id}']);
      expect(logger.of('warn')).toHaveLength(1);
      expect(logger.of('warn')[0]).toContain('Skipping GET /users/{id}: could not compile match patterns');
    });
  });
});
