/**
 * LayoutClient against a mocked fetch.
 */
import { beforeEach, describe, test, expect, vi } from 'vitest';
import fetch, { Response } from 'node-fetch';
import { LayoutClient, LayoutClientError } from '../index';

vi.mock('node-fetch', async (importOriginal) => {
  const actual = await importOriginal<typeof import('node-fetch')>();
  return { ...actual, default: vi.fn() };
});

const fetchMock = vi.mocked(fetch);

function respondWith(status: number, body: unknown) {
  fetchMock.mockResolvedValueOnce(new Response(JSON.stringify(body), { status }));
}

function lastCall() {
  const [url, init] = fetchMock.mock.calls[fetchMock.mock.calls.length - 1];
  return { url, init };
}

beforeEach(() => {
  fetchMock.mockReset();
});

describe('LayoutClient', () => {
  test('health uses GET on the base url', async () => {
    respondWith(200, { ok: true });
    const client = new LayoutClient({ baseUrl: 'http://layout.test/' });
    await expect(client.health()).resolves.toEqual({ ok: true });
    const { url, init } = lastCall();
    expect(url).toBe('http://layout.test/health');
    expect(init).toEqual({ headers: { 'content-type': 'application/json' } });
  });

  test('pageToAlto posts the snapshot as base64 with the api key', async () => {
    respondWith(200, { altoXml: '<alto/>', skippedLines: ['l2'] });
    const client = new LayoutClient({ baseUrl: 'http://layout.test', apiKey: 'test-key' });
    const out = await client.pageToAlto('<PcGts/>', new Uint8Array([1, 2, 3]));
    expect(out).toEqual({ altoXml: '<alto/>', skippedLines: ['l2'] });
    const { url, init } = lastCall();
    expect(url).toBe('http://layout.test/convert/page-to-alto');
    expect(init).toEqual({
      method: 'POST',
      headers: { 'content-type': 'application/json', authorization: 'Bearer test-key' },
      body: JSON.stringify({ pageXml: '<PcGts/>', logits: 'AQID' }),
    });
  });

  test('altoToPage and summary post their documents', async () => {
    const client = new LayoutClient({ baseUrl: 'http://layout.test' });
    respondWith(200, { pageXml: '<PcGts/>' });
    await expect(client.altoToPage('<alto/>')).resolves.toEqual({ pageXml: '<PcGts/>' });
    expect(lastCall().url).toBe('http://layout.test/convert/alto-to-page');

    const summary = { id: 'p', size: { height: 1, width: 2 }, regions: [{ id: 'r1', lines: 3 }] };
    respondWith(200, summary);
    await expect(client.summary('<PcGts/>')).resolves.toEqual(summary);
    expect(lastCall().url).toBe('http://layout.test/layout/summary');
    expect(lastCall().init?.body).toBe(JSON.stringify({ pageXml: '<PcGts/>' }));
  });

  test('non-2xx responses raise LayoutClientError', async () => {
    respondWith(422, { error: 'missing_prerequisite', message: 'Line l1: missing heights.' });
    const client = new LayoutClient({ baseUrl: 'http://layout.test' });
    const err = await client.altoToPage('<alto/>').catch((e: unknown) => e);
    expect(err).toBeInstanceOf(LayoutClientError);
    expect(err).toMatchObject({
      status: 422,
      body: '{"error":"missing_prerequisite","message":"Line l1: missing heights."}',
    });
  });
});
