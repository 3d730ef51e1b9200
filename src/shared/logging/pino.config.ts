import { Params } from 'nestjs-pino';
import { IncomingMessage, ServerResponse } from 'http';
import { multistream } from 'pino';
import pinoPretty from 'pino-pretty';
import { createWriteStream } from 'fs';
import { join } from 'path';
import { ensureRequestId } from '../middleware/request-id.middleware';

const serviceName = process.env.SERVICE_NAME || 'document-structuring-service';
const logDir = process.env.LOG_DIR;

export const pinoConfig: Params = {
  pinoHttp: {
    level: process.env.LOG_LEVEL || 'info',

    base: {
      service: serviceName,
      environment: process.env.NODE_ENV || 'development',
      version: process.env.APP_VERSION || '1.0.0',
    },

    redact: {
      paths: ['req.headers.authorization', 'req.headers.cookie'],
      remove: true,
    },

    timestamp: () => `,"timestamp":"${new Date().toISOString()}"`,

    serializers: {
      req: (req: IncomingMessage & { id?: string }) => ({
        id: req.id,
        method: req.method,
        url: req.url,
        headers: process.env.NODE_ENV === 'production' ? undefined : req.headers,
      }),
      res: (res: ServerResponse) => ({
        statusCode: res.statusCode,
      }),
    },

    autoLogging: {
      ignore: (req: IncomingMessage) => (req.url || '') === '/health',
    },

    // Runs before RequestIdMiddleware; the id it assigns is the one echoed back
    genReqId: (req: IncomingMessage) => ensureRequestId(req),

    customProps: (req: IncomingMessage) => ({
      requestId: ensureRequestId(req),
    }),

    // Console (pretty outside production), plus a JSON file when LOG_DIR is set
    stream: multistream([
      {
        level: 'info',
        stream:
          process.env.NODE_ENV !== 'production'
            ? pinoPretty({
                colorize: true,
                translateTime: 'HH:MM:ss Z',
                ignore: 'pid,hostname',
                singleLine: false,
              })
            : process.stdout,
      },
      ...(logDir
        ? [
            {
              level: 'debug' as const,
              stream: createWriteStream(join(logDir, `${serviceName}.log`), {
                flags: 'a',
              }),
            },
          ]
        : []),
    ]),
  },
};
