import type { FastifyInstance } from 'fastify';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';

import { computeCid } from '@/blockstore/cid.js';
import { MemoryBlockstore } from '@/blockstore/memory-blockstore.js';
import { createServer } from '@/server.js';

import { createTestConfig } from '../helpers/config.js';
import { createBasicStore, type BasicStore } from '../helpers/stores.js';

// ---------------------------------------------------------------------------
// Test helpers
// ---------------------------------------------------------------------------

const BOUNDARY = '----TestBoundary123';

// SHA-256 of the ASCII string "hello"
const HELLO_CID = '2cf24dba5fb0a30e26e83b2ac5b9e29e1b161e5c1fa7425e73043362938b9824';
const MISSING_CID = computeCid(Buffer.from('never stored'));

/** Build a multipart/form-data body with one file part per payload */
function createMultipartBody(...contents: Buffer[]) {
  const parts = contents.map((content, i) =>
    Buffer.concat([
      Buffer.from(`--${BOUNDARY}\r\n`),
      Buffer.from(`Content-Disposition: form-data; name="file"; filename="block-${i}.bin"\r\n`),
      Buffer.from('Content-Type: application/octet-stream\r\n\r\n'),
      content,
      Buffer.from('\r\n'),
    ])
  );
  const body = Buffer.concat([...parts, Buffer.from(`--${BOUNDARY}--\r\n`)]);
  return { body, boundary: BOUNDARY };
}

/** Multipart body carrying only a text field */
function createFieldOnlyBody() {
  const body = Buffer.from(
    `--${BOUNDARY}\r\n` +
      `Content-Disposition: form-data; name="notafile"\r\n\r\n` +
      `some text\r\n` +
      `--${BOUNDARY}--\r\n`
  );
  return { body, boundary: BOUNDARY };
}

async function upload(server: FastifyInstance, content: Buffer) {
  const { body, boundary } = createMultipartBody(content);
  return server.inject({
    method: 'POST',
    url: '/blocks',
    headers: { 'content-type': `multipart/form-data; boundary=${boundary}` },
    payload: body,
  });
}

async function scrape(server: FastifyInstance): Promise<string> {
  const response = await server.inject({ method: 'GET', url: '/metrics' });
  return response.body;
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('Block routes (memory backend)', () => {
  let server: FastifyInstance;
  let backend: MemoryBlockstore;

  beforeEach(async () => {
    backend = new MemoryBlockstore();
    server = await createServer({ config: createTestConfig(), backend });
    await server.ready();
  });

  afterEach(async () => {
    await server.close();
  });

  describe('POST /blocks', () => {
    it('should store the block and return its identifier', async () => {
      const response = await upload(server, Buffer.from('hello'));

      expect(response.statusCode).toBe(201);
      expect(response.json()).toEqual({ cid: HELLO_CID, size: 5 });
      expect(await backend.has(HELLO_CID)).toBe(true);
    });

    it('should count the put and observe its size', async () => {
      await upload(server, Buffer.from('hello'));

      const metrics = await scrape(server);
      expect(metrics).toMatch(/^blockstore_put_total 1$/m);
      expect(metrics).toMatch(/^blockstore_put_size_bytes_sum 5$/m);
      expect(metrics).toMatch(/^blockstore_put_size_bytes_bucket\{le="64"\} 1$/m);
    });

    it('should return 400 when no file is in the multipart request', async () => {
      const { body, boundary } = createFieldOnlyBody();

      const response = await server.inject({
        method: 'POST',
        url: '/blocks',
        headers: { 'content-type': `multipart/form-data; boundary=${boundary}` },
        payload: body,
      });

      expect(response.statusCode).toBe(400);
      expect(response.json().error.code).toBe('REQUEST_NO_FILE');
    });
  });

  describe('POST /blocks/batch', () => {
    it('should store every file part with one putMany', async () => {
      const { body, boundary } = createMultipartBody(
        Buffer.from('hello'),
        Buffer.from('second block')
      );

      const response = await server.inject({
        method: 'POST',
        url: '/blocks/batch',
        headers: { 'content-type': `multipart/form-data; boundary=${boundary}` },
        payload: body,
      });

      expect(response.statusCode).toBe(201);
      expect(response.json()).toEqual({
        blocks: [
          { cid: HELLO_CID, size: 5 },
          { cid: computeCid(Buffer.from('second block')), size: 12 },
        ],
      });

      const metrics = await scrape(server);
      expect(metrics).toMatch(/^blockstore_putmany_total 1$/m);
      expect(metrics).toMatch(/^blockstore_putmany_size_bytes_sum 2$/m);
      expect(metrics).toMatch(/^blockstore_put_total 0$/m);
    });

    it('should return 400 for a batch without file parts', async () => {
      const { body, boundary } = createFieldOnlyBody();

      const response = await server.inject({
        method: 'POST',
        url: '/blocks/batch',
        headers: { 'content-type': `multipart/form-data; boundary=${boundary}` },
        payload: body,
      });

      expect(response.statusCode).toBe(400);
      expect(response.json().error.code).toBe('REQUEST_NO_FILE');
    });
  });

  describe('GET /blocks/:cid', () => {
    it('should return the stored bytes through the view path', async () => {
      await upload(server, Buffer.from('hello'));

      const response = await server.inject({ method: 'GET', url: `/blocks/${HELLO_CID}` });

      expect(response.statusCode).toBe(200);
      expect(response.headers['content-type']).toBe('application/octet-stream');
      expect(response.headers['content-length']).toBe('5');
      expect(response.rawPayload.toString('utf-8')).toBe('hello');

      const metrics = await scrape(server);
      expect(metrics).toMatch(/^blockstore_view_total 1$/m);
      expect(metrics).toMatch(/^blockstore_get_total 0$/m);
    });

    it('should return 404 for a missing block without counting an error', async () => {
      const response = await server.inject({ method: 'GET', url: `/blocks/${MISSING_CID}` });

      expect(response.statusCode).toBe(404);
      const body = response.json();
      expect(body.error.code).toBe('BLOCK_NOT_FOUND');
      expect(body.error.message).toBe(`Block not found: ${MISSING_CID}`);

      const metrics = await scrape(server);
      expect(metrics).toMatch(/^blockstore_view_total 1$/m);
      expect(metrics).toMatch(/^blockstore_view_errors_total 0$/m);
    });

    it('should return 400 for a malformed identifier', async () => {
      const response = await server.inject({ method: 'GET', url: '/blocks/not-a-cid' });

      expect(response.statusCode).toBe(400);
      expect(response.json().error.code).toBe('BLOCK_INVALID_CID');

      const metrics = await scrape(server);
      expect(metrics).toMatch(/^blockstore_view_errors_total 1$/m);
    });
  });

  describe('GET /blocks/:cid/exists and /size', () => {
    it('should report presence and size of a stored block', async () => {
      await upload(server, Buffer.from('hello'));

      const exists = await server.inject({ method: 'GET', url: `/blocks/${HELLO_CID}/exists` });
      const size = await server.inject({ method: 'GET', url: `/blocks/${HELLO_CID}/size` });

      expect(exists.json()).toEqual({ cid: HELLO_CID, exists: true });
      expect(size.json()).toEqual({ cid: HELLO_CID, size: 5 });
    });

    it('should report absence and 404 on size for a missing block', async () => {
      const exists = await server.inject({ method: 'GET', url: `/blocks/${MISSING_CID}/exists` });
      const size = await server.inject({ method: 'GET', url: `/blocks/${MISSING_CID}/size` });

      expect(exists.json()).toEqual({ cid: MISSING_CID, exists: false });
      expect(size.statusCode).toBe(404);

      const metrics = await scrape(server);
      expect(metrics).toMatch(/^blockstore_has_total 1$/m);
      expect(metrics).toMatch(/^blockstore_getsize_total 1$/m);
      expect(metrics).toMatch(/^blockstore_getsize_errors_total 0$/m);
    });
  });

  describe('GET /blocks', () => {
    it('should list stored identifiers up to the limit', async () => {
      await upload(server, Buffer.from('hello'));
      await upload(server, Buffer.from('second block'));

      const all = await server.inject({ method: 'GET', url: '/blocks' });
      const limited = await server.inject({ method: 'GET', url: '/blocks?limit=1' });

      expect(all.json()).toEqual({
        cids: [HELLO_CID, computeCid(Buffer.from('second block'))],
      });
      expect(limited.json()).toEqual({ cids: [HELLO_CID] });
    });

    it('should reject a limit below one', async () => {
      const response = await server.inject({ method: 'GET', url: '/blocks?limit=0' });

      expect(response.statusCode).toBe(400);
      expect(response.json().error.code).toBe('FST_ERR_VALIDATION');
    });
  });

  describe('DELETE /blocks/:cid', () => {
    it('should delete the block and return 204', async () => {
      await upload(server, Buffer.from('hello'));

      const response = await server.inject({ method: 'DELETE', url: `/blocks/${HELLO_CID}` });

      expect(response.statusCode).toBe(204);
      expect(await backend.has(HELLO_CID)).toBe(false);
      expect(await scrape(server)).toMatch(/^blockstore_delete_total 1$/m);
    });

    it('should return 204 for a block that was never stored', async () => {
      const response = await server.inject({ method: 'DELETE', url: `/blocks/${MISSING_CID}` });

      expect(response.statusCode).toBe(204);
    });
  });

  describe('POST /blocks/delete', () => {
    it('should delete the batch with one batched call', async () => {
      await upload(server, Buffer.from('hello'));
      await upload(server, Buffer.from('second block'));

      const response = await server.inject({
        method: 'POST',
        url: '/blocks/delete',
        payload: { cids: [HELLO_CID, computeCid(Buffer.from('second block'))] },
      });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({ requested: 2 });

      const metrics = await scrape(server);
      expect(metrics).toMatch(/^blockstore_deletemany_total 1$/m);
      expect(metrics).toMatch(/^blockstore_deletemany_size_items_sum 2$/m);
      expect(metrics).toMatch(/^blockstore_delete_total 0$/m);
    });

    it('should report the identifiers requested, including absent ones', async () => {
      await upload(server, Buffer.from('hello'));

      const response = await server.inject({
        method: 'POST',
        url: '/blocks/delete',
        payload: { cids: [HELLO_CID, HELLO_CID, MISSING_CID] },
      });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({ requested: 3 });
      expect(await backend.has(HELLO_CID)).toBe(false);
    });

    it('should reject an empty batch', async () => {
      const response = await server.inject({
        method: 'POST',
        url: '/blocks/delete',
        payload: { cids: [] },
      });

      expect(response.statusCode).toBe(400);
    });
  });
});

describe('Block routes (backend without optional capabilities)', () => {
  let server: FastifyInstance;
  let backend: BasicStore;

  beforeEach(async () => {
    backend = createBasicStore();
    server = await createServer({ config: createTestConfig(), backend });
    await server.ready();
  });

  afterEach(async () => {
    await server.close();
  });

  it('should serve downloads through get when the backend has no view', async () => {
    await upload(server, Buffer.from('hello'));

    const response = await server.inject({ method: 'GET', url: `/blocks/${HELLO_CID}` });

    expect(response.statusCode).toBe(200);
    expect(response.rawPayload.toString('utf-8')).toBe('hello');
    expect(backend.get).toHaveBeenCalledWith(HELLO_CID);

    const metrics = await scrape(server);
    expect(metrics).toMatch(/^blockstore_get_total 1$/m);
    expect(metrics).toMatch(/^blockstore_get_size_bytes_sum 5$/m);
    expect(metrics).toMatch(/^blockstore_view_total 0$/m);
  });

  it('should delete a batch one block at a time', async () => {
    await upload(server, Buffer.from('hello'));
    await upload(server, Buffer.from('second block'));

    const response = await server.inject({
      method: 'POST',
      url: '/blocks/delete',
      payload: { cids: [HELLO_CID, computeCid(Buffer.from('second block'))] },
    });

    expect(response.json()).toEqual({ requested: 2 });
    expect(backend.deleteBlock).toHaveBeenCalledTimes(2);

    const metrics = await scrape(server);
    expect(metrics).toMatch(/^blockstore_delete_total 2$/m);
    expect(metrics).toMatch(/^blockstore_deletemany_total 0$/m);
  });

  it('should sanitize unexpected backend failures', async () => {
    backend.get.mockRejectedValueOnce(new Error('EIO: read failed at /var/lib/blocks'));

    const response = await server.inject({ method: 'GET', url: `/blocks/${HELLO_CID}` });

    expect(response.statusCode).toBe(500);
    expect(response.json().error.message).toBe('An internal error occurred');
    expect(await scrape(server)).toMatch(/^blockstore_get_errors_total 1$/m);
  });
});

describe('Block routes (write rate limit)', () => {
  let server: FastifyInstance;
  let backend: MemoryBlockstore;

  beforeEach(async () => {
    backend = new MemoryBlockstore();
    server = await createServer({
      config: createTestConfig({ rateLimit: { global: 1000, sensitive: 1, windowMs: 60000 } }),
      backend,
    });
    await server.ready();
  });

  afterEach(async () => {
    await server.close();
  });

  it('should reject a second write in the window with 429', async () => {
    const first = await upload(server, Buffer.from('hello'));
    const second = await upload(server, Buffer.from('second block'));

    expect(first.statusCode).toBe(201);
    expect(second.statusCode).toBe(429);
    expect(second.json().error.statusCode).toBe(429);
    expect(second.json().error.message).toMatch(/^Rate limit exceeded/);
    expect(await backend.has(computeCid(Buffer.from('second block')))).toBe(false);
  });

  it('should keep reads under the global limit', async () => {
    await upload(server, Buffer.from('hello'));

    const response = await server.inject({ method: 'GET', url: `/blocks/${HELLO_CID}` });
    expect(response.statusCode).toBe(200);
  });
});
