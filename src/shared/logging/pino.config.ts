import { Params } from 'nestjs-pino';
import { IncomingMessage, ServerResponse } from 'http';
import { multistream } from 'pino';
import pinoPretty from 'pino-pretty';
import { createWriteStream } from 'fs';
import { join } from 'path';
import { v4 as uuidv4 } from 'uuid';

const serviceName = process.env.SERVICE_NAME || 'rag-chat-service';
const logDir = process.env.LOG_DIR;

const prettyConsole =
  process.env.NODE_ENV !== 'production' && process.env.NODE_ENV !== 'test';

const requestIdOf = (req: IncomingMessage): string | undefined => {
  const requestId = req.headers['x-request-id'];
  return typeof requestId === 'string' && requestId ? requestId : undefined;
};

export const pinoConfig: Params = {
  pinoHttp: {
    level: process.env.LOG_LEVEL || 'info',

    base: {
      service: serviceName,
      environment: process.env.NODE_ENV || 'development',
      version: process.env.APP_VERSION || '0.1.0',
    },

    redact: {
      paths: [
        'req.headers.authorization',
        'req.headers.cookie',
        'req.headers["x-api-key"]',
        'apiKey',
        'api_key',
      ],
      remove: true,
    },

    timestamp: () => `,"timestamp":"${new Date().toISOString()}"`,

    serializers: {
      req: (req: IncomingMessage) => ({
        id: req.id,
        method: req.method,
        url: req.url,
        headers:
          process.env.NODE_ENV === 'production' ? undefined : req.headers,
      }),
      res: (res: ServerResponse) => ({
        statusCode: res.statusCode,
      }),
    },

    autoLogging: {
      ignore: (req: IncomingMessage) => {
        const url = req.url || '';
        return url === '/health' || url === '/metrics';
      },
    },

    genReqId: (req: IncomingMessage) => requestIdOf(req) ?? `req-${uuidv4()}`,

    customProps: (req: IncomingMessage) => ({
      requestId: requestIdOf(req) ?? req.id,
    }),

    // Console (pretty in development) plus JSON file when LOG_DIR is set
    stream: multistream([
      {
        level: 'info',
        stream:
          prettyConsole
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
