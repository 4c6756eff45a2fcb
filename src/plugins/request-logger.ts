import type { FastifyPluginCallback, FastifyRequest } from 'fastify';
import fp from 'fastify-plugin';

interface RequestLoggerOptions {
  isDev: boolean;
  /** Routes logged at debug instead of info (scrapes and probes) */
  quietUrls?: string[];
}

function blockCid(request: FastifyRequest): unknown {
  const params = request.params;
  if (typeof params === 'object' && params !== null && 'cid' in params) {
    return params.cid;
  }
  return undefined;
}

const requestLogger: FastifyPluginCallback<RequestLoggerOptions> = (fastify, options, done) => {
  const { isDev } = options;
  const quietUrls = new Set(options.quietUrls ?? []);

  const isQuiet = (request: FastifyRequest): boolean =>
    quietUrls.has(request.routeOptions.url ?? request.url);

  // Log incoming requests
  fastify.addHook('onRequest', async (request) => {
    const logData: Record<string, unknown> = {
      method: request.method,
      url: request.url,
      requestId: request.id,
      userAgent: request.headers['user-agent'],
    };

    const cid = blockCid(request);
    if (cid !== undefined) {
      logData.cid = cid;
    }

    // Content type only in dev; block payloads are never logged
    if (isDev) {
      logData.contentType = request.headers['content-type'];
    }

    if (isQuiet(request)) {
      request.log.debug(logData, 'Incoming request');
    } else {
      request.log.info(logData, 'Incoming request');
    }
  });

  // Log completed responses
  fastify.addHook('onResponse', async (request, reply) => {
    const logData: Record<string, unknown> = {
      method: request.method,
      url: request.url,
      statusCode: reply.statusCode,
      responseTime: reply.elapsedTime,
      requestId: request.id,
    };

    // Log at appropriate level based on status code
    if (reply.statusCode >= 500) {
      request.log.error(logData, 'Request completed with server error');
    } else if (reply.statusCode >= 400) {
      request.log.warn(logData, 'Request completed with client error');
    } else if (isQuiet(request)) {
      request.log.debug(logData, 'Request completed');
    } else {
      request.log.info(logData, 'Request completed');
    }
  });

  done();
};

export const requestLoggerPlugin = fp(requestLogger, {
  name: 'request-logger',
  fastify: '5.x',
});
