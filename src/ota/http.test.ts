/**
 * Tests for the fetch-backed update service client
 */

import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import { FetchHttpClient, OtaHttpError, UnexpectedContentTypeError } from './http.js';

const LISTING_URL = 'https://ota.example.org/routedb/api.php';

const mockFetch = jest.fn<typeof fetch>();
const originalFetch = global.fetch;

describe('FetchHttpClient', () => {
  beforeEach(() => {
    mockFetch.mockReset();
    global.fetch = mockFetch;
  });

  afterEach(() => {
    global.fetch = originalFetch;
  });

  describe('retrieveJsonResource', () => {
    it('returns the body of a JSON response', async () => {
      mockFetch.mockResolvedValue(
        new Response('[]', {
          status: 200,
          headers: { 'Content-Type': 'application/json; charset=utf-8' },
        })
      );

      const body = await new FetchHttpClient().retrieveJsonResource(LISTING_URL);

      expect(body).toBe('[]');
      expect(mockFetch).toHaveBeenCalledWith(
        LISTING_URL,
        expect.objectContaining({ headers: { Accept: 'application/json' } })
      );
    });

    it('accepts structured JSON media types', async () => {
      mockFetch.mockResolvedValue(
        new Response('{}', { status: 200, headers: { 'Content-Type': 'application/vnd.api+json' } })
      );

      await expect(new FetchHttpClient().retrieveJsonResource(LISTING_URL)).resolves.toBe('{}');
    });

    it('rejects other content types', async () => {
      mockFetch.mockResolvedValue(
        new Response('<html></html>', { status: 200, headers: { 'Content-Type': 'text/html' } })
      );

      const promise = new FetchHttpClient().retrieveJsonResource(LISTING_URL);

      await expect(promise).rejects.toBeInstanceOf(UnexpectedContentTypeError);
      await expect(promise).rejects.toThrow(
        'Expected a JSON response from https://ota.example.org/routedb/api.php, got text/html'
      );
    });

    it('rejects a response without content type', async () => {
      mockFetch.mockResolvedValue(new Response(null, { status: 200 }));

      await expect(new FetchHttpClient().retrieveJsonResource(LISTING_URL)).rejects.toThrow(
        'Expected a JSON response from https://ota.example.org/routedb/api.php, got no content type'
      );
    });

    it('rejects error status codes', async () => {
      mockFetch.mockResolvedValue(
        new Response('missing', { status: 404, statusText: 'Not Found' })
      );

      const promise = new FetchHttpClient().retrieveJsonResource(LISTING_URL);

      await expect(promise).rejects.toBeInstanceOf(OtaHttpError);
      await expect(promise).rejects.toMatchObject({
        message: 'HTTP 404 Not Found',
        statusCode: 404,
        url: LISTING_URL,
      });
    });

    it('passes network failures through', async () => {
      mockFetch.mockRejectedValue(new TypeError('fetch failed'));

      await expect(new FetchHttpClient().retrieveJsonResource(LISTING_URL)).rejects.toThrow(
        'fetch failed'
      );
    });

    it('times out slow requests', async () => {
      mockFetch.mockImplementation(
        (_input, init) =>
          new Promise<Response>((_resolve, reject) => {
            init?.signal?.addEventListener('abort', () => {
              const error = new Error('This operation was aborted');
              error.name = 'AbortError';
              reject(error);
            });
          })
      );

      await expect(
        new FetchHttpClient({ timeoutMs: 5 }).retrieveJsonResource(LISTING_URL)
      ).rejects.toMatchObject({
        name: 'OtaHttpError',
        message: 'Request timed out after 5ms',
        statusCode: 408,
      });
    });
  });

  describe('retrieveBinaryResource', () => {
    it('returns the body bytes', async () => {
      mockFetch.mockResolvedValue(new Response(new Uint8Array([83, 81, 76])));

      const bytes = await new FetchHttpClient().retrieveBinaryResource(
        'https://ota.example.org/routedb/files/a.sqlite'
      );

      expect(bytes).toEqual(new Uint8Array([83, 81, 76]));
      expect(mockFetch).toHaveBeenCalledWith(
        'https://ota.example.org/routedb/files/a.sqlite',
        expect.objectContaining({ headers: { Accept: 'application/octet-stream' } })
      );
    });

    it('does not check the content type', async () => {
      mockFetch.mockResolvedValue(
        new Response(new Uint8Array([1]), { headers: { 'Content-Type': 'text/html' } })
      );

      await expect(
        new FetchHttpClient().retrieveBinaryResource('https://ota.example.org/routedb/files/a.sqlite')
      ).resolves.toEqual(new Uint8Array([1]));
    });

    it('rejects error status codes', async () => {
      mockFetch.mockResolvedValue(new Response(null, { status: 500, statusText: '' }));

      await expect(
        new FetchHttpClient().retrieveBinaryResource('https://ota.example.org/routedb/files/a.sqlite')
      ).rejects.toMatchObject({ message: 'HTTP 500', statusCode: 500 });
    });
  });
});
