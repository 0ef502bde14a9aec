import { describe, it, expect } from 'vitest';
import {
  parseHttpMethod,
  createEndpoint,
  endpointKey,
  formatEndpoint,
  compareEndpoints,
  extractEndpoints,
} from '../../../src/openapi/endpoints.js';

describe('Endpoint model', () => {
  describe('parseHttpMethod', () => {
    it('should accept every method regardless of case', () => {
      expect(parseHttpMethod('get')).toBe('GET');
      expect(parseHttpMethod('Post')).toBe('POST');
      expect(parseHttpMethod('DELETE')).toBe('DELETE');
      expect(parseHttpMethod('options')).toBe('OPTIONS');
      expect(parseHttpMethod('trace')).toBe('TRACE');
    });

    it('should return null for tokens that are not HTTP methods', () => {
      expect(parseHttpMethod('parameters')).toBeNull();
      expect(parseHttpMethod('connect')).toBeNull();
      expect(parseHttpMethod('')).toBeNull();
    });
  });

  describe('identity', () => {
    it('should give structurally equal endpoints the same key', () => {
      const a = createEndpoint('/users', 'GET');
      const b = createEndpoint('/users', 'GET');

      expect(endpointKey(a)).toBe(endpointKey(b));
      expect(endpointKey(a)).not.toBe(endpointKey(createEndpoint('/users', 'POST')));
      expect(endpointKey(a)).not.toBe(endpointKey(createEndpoint('/users/', 'GET')));
    });

    it('should freeze created endpoints', () => {
      expect(Object.isFrozen(createEndpoint('/users', 'GET'))).toBe(true);
    });

    it('should render as "METHOD path"', () => {
      expect(formatEndpoint(createEndpoint('/users/{id}', 'PATCH'))).toBe('PATCH /users/{id}');
    });
  });

  describe('compareEndpoints', () => {
    it('should order by path first, then method', () => {
      const endpoints = [
        createEndpoint('/b', 'GET'),
        createEndpoint('/a', 'POST'),
        createEndpoint('/a', 'DELETE'),
        createEndpoint('/a/{id}', 'GET'),
      ];

      const sorted = [...endpoints].sort(compareEndpoints).map(formatEndpoint);

      expect(sorted).toEqual(['DELETE /a', 'POST /a', 'GET /a/{id}', 'GET /b']);
    });

    it('should compare by code unit rather than locale', () => {
      const upper = createEndpoint('/Zebra', 'GET');
      const lower = createEndpoint('/apple', 'GET');

      expect(compareEndpoints(upper, lower)).toBeLessThan(0);
    });
  });

  describe('extractEndpoints', () => {
    it('should produce one endpoint per path and method', () => {
      const endpoints = extractEndpoints({
        '/users': { get: {}, post: {} },
        '/users/{id}': { get: {}, delete: {} },
      });

      expect(endpoints.map(formatEndpoint)).toEqual([
        'GET /users',
        'POST /users',
        'GET /users/{id}',
        'DELETE /users/{id}',
      ]);
    });

    it('should skip keys that are not HTTP methods', () => {
      const endpoints = extractEndpoints({
        '/users': { summary: 'Users', parameters: [], $ref: '#/x', get: {}, connect: {} },
      });

      expect(endpoints.map(formatEndpoint)).toEqual(['GET /users']);
    });

    it('should skip path items that are not objects', () => {
      const endpoints = extractEndpoints({
        '/broken': 'not an object',
        '/null': null,
        '/list': ['get'],
        '/ok': { head: {} },
      });

      expect(endpoints.map(formatEndpoint)).toEqual(['HEAD /ok']);
    });

    it('should collapse method keys that differ only in case', () => {
      const endpoints = extractEndpoints({
        '/users': { get: {}, GET: {} },
      });

      expect(endpoints).toHaveLength(1);
      expect(endpoints[0]).toEqual({ path: '/users', method: 'GET' });
    });

    it('should return an empty list for an empty path table', () => {
      expect(extractEndpoints({})).toEqual([]);
    });
  });
});
