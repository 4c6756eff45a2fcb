// Block storage routes.
//
// Every handler goes through the measured blockstore, so each request moves
// the matching operation metrics. Storage errors are not caught here: the
// error handler maps BLOCK_NOT_FOUND to 404 and BLOCK_INVALID_CID to 400.

import type { FastifyPluginCallback } from 'fastify';
import fp from 'fastify-plugin';
import { z } from 'zod';

// Import for type augmentation -- adds request.file() to FastifyRequest
import '@fastify/multipart';

import { createBlock } from '../blockstore/cid.js';
import type { Block, Cid } from '../blockstore/types.js';
import { RequestNoFileError } from '../errors/index.js';

export const MAX_BLOCK_BYTES = 16 * 1024 * 1024; // 16 MiB
export const MAX_BATCH_BLOCKS = 100;
const MAX_DELETE_BATCH = 1000;
const DEFAULT_LIST_LIMIT = 1000;

interface CidParams {
  cid: Cid;
}

interface ListQuery {
  limit: number;
}

interface DeleteManyBody {
  cids: Cid[];
}

const cidParamsSchema = z.object({
  cid: z.string().describe('Content identifier (SHA-256 hex digest)'),
});

const storedBlockSchema = z.object({
  cid: z.string(),
  size: z.number(),
});

const blockRoutes: FastifyPluginCallback = (fastify, _options, done) => {
  const writeRateLimit = {
    rateLimit: {
      max: fastify.config.rateLimit.sensitive,
      timeWindow: fastify.config.rateLimit.windowMs,
    },
  };

  fastify.post(
    '/blocks',
    {
      schema: {
        description: 'Store one block (multipart "file" field); returns its identifier',
        tags: ['Blocks'],
        response: { 201: storedBlockSchema },
      },
      config: writeRateLimit,
      bodyLimit: MAX_BLOCK_BYTES + 64 * 1024,
    },
    async (request, reply) => {
      const file = await request.file();
      if (!file) {
        throw new RequestNoFileError('send a multipart/form-data request with a "file" field');
      }

      const block = createBlock(await file.toBuffer());
      await fastify.blockstore.put(block);

      request.log.info({ cid: block.cid, size: block.data.byteLength }, 'Block stored');
      return reply.status(201).send({ cid: block.cid, size: block.data.byteLength });
    }
  );

  fastify.post(
    '/blocks/batch',
    {
      schema: {
        description: 'Store several blocks (one multipart file part per block)',
        tags: ['Blocks'],
        response: { 201: z.object({ blocks: z.array(storedBlockSchema) }) },
      },
      config: writeRateLimit,
    },
    async (request, reply) => {
      const blocks: Block[] = [];
      for await (const part of request.files()) {
        blocks.push(createBlock(await part.toBuffer()));
      }
      if (blocks.length === 0) {
        throw new RequestNoFileError('batch contains no file parts');
      }

      await fastify.blockstore.putMany(blocks);

      request.log.info({ count: blocks.length }, 'Block batch stored');
      return reply.status(201).send({
        blocks: blocks.map((block) => ({ cid: block.cid, size: block.data.byteLength })),
      });
    }
  );

  fastify.get<{ Querystring: ListQuery }>(
    '/blocks',
    {
      schema: {
        description: 'List stored block identifiers',
        tags: ['Blocks'],
        querystring: z.object({
          limit: z.coerce.number().int().min(1).max(10000).default(DEFAULT_LIST_LIMIT),
        }),
        response: { 200: z.object({ cids: z.array(z.string()) }) },
      },
    },
    async (request) => {
      const { limit } = request.query;
      const cids: Cid[] = [];
      // Leaving the loop early releases the backend's enumeration
      for await (const cid of fastify.blockstore.allKeys()) {
        cids.push(cid);
        if (cids.length >= limit) break;
      }
      return { cids };
    }
  );

  fastify.get<{ Params: CidParams }>(
    '/blocks/:cid',
    {
      schema: {
        description: 'Download a block payload',
        tags: ['Blocks'],
        params: cidParamsSchema,
      },
    },
    async (request, reply) => {
      const { cid } = request.params;
      // Copy out of the view; the backend may reuse the underlying bytes
      const data = await fastify.blockstore.view(cid, (bytes) => Buffer.from(bytes));

      return reply
        .status(200)
        .header('Content-Type', 'application/octet-stream')
        .header('Content-Length', data.length.toString())
        .send(data);
    }
  );

  fastify.get<{ Params: CidParams }>(
    '/blocks/:cid/exists',
    {
      schema: {
        description: 'Check whether a block is stored',
        tags: ['Blocks'],
        params: cidParamsSchema,
        response: { 200: z.object({ cid: z.string(), exists: z.boolean() }) },
      },
    },
    async (request) => {
      const { cid } = request.params;
      return { cid, exists: await fastify.blockstore.has(cid) };
    }
  );

  fastify.get<{ Params: CidParams }>(
    '/blocks/:cid/size',
    {
      schema: {
        description: 'Payload size of a stored block in bytes',
        tags: ['Blocks'],
        params: cidParamsSchema,
        response: { 200: storedBlockSchema },
      },
    },
    async (request) => {
      const { cid } = request.params;
      return { cid, size: await fastify.blockstore.getSize(cid) };
    }
  );

  fastify.delete<{ Params: CidParams }>(
    '/blocks/:cid',
    {
      schema: {
        description: 'Delete one block (no-op if absent)',
        tags: ['Blocks'],
        params: cidParamsSchema,
      },
      config: writeRateLimit,
    },
    async (request, reply) => {
      const { cid } = request.params;
      await fastify.blockstore.deleteBlock(cid);

      request.log.info({ cid }, 'Block deleted');
      return reply.status(204).send();
    }
  );

  fastify.post<{ Body: DeleteManyBody }>(
    '/blocks/delete',
    {
      schema: {
        description:
          'Delete a batch of blocks; stops at the first failure. Absent blocks are skipped, ' +
          'so `requested` counts the identifiers sent, not the blocks removed',
        tags: ['Blocks'],
        body: z.object({
          cids: z.array(z.string()).min(1).max(MAX_DELETE_BATCH),
        }),
        response: { 200: z.object({ requested: z.number() }) },
      },
      config: writeRateLimit,
    },
    async (request) => {
      const { cids } = request.body;
      await fastify.blockstore.deleteMany(cids);

      request.log.info({ count: cids.length }, 'Block batch deleted');
      return { requested: cids.length };
    }
  );

  done();
};

export const blockRoutesPlugin = fp(blockRoutes, {
  name: 'block-routes',
  fastify: '5.x',
});
