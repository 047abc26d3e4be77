import { Params } from 'nestjs-pino';
import { IncomingMessage, ServerResponse } from 'http';
import { multistream, StreamEntry } from 'pino';
import pinoPretty from 'pino-pretty';
import { createWriteStream, mkdirSync } from 'fs';
import { join } from 'path';

const serviceName = process.env.SERVICE_NAME || 'book-assistant-retrieval';

/**
 * Console stream: pretty in development, raw JSON in production.
 * When LOG_DIR is set a JSON file stream is added at debug level.
 */
function buildStreams(): StreamEntry[] {
  const streams: StreamEntry[] = [
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
  ];

  const logDir = process.env.LOG_DIR;
  if (logDir) {
    mkdirSync(logDir, { recursive: true });
    streams.push({
      level: 'debug',
      stream: createWriteStream(join(logDir, `${serviceName}.log`), {
        flags: 'a',
      }),
    });
  }

  return streams;
}

export const pinoConfig: Params = {
  pinoHttp: {
    level: process.env.LOG_LEVEL || 'info',

    base: {
      service: serviceName,
      environment: process.env.NODE_ENV || 'development',
      version: process.env.APP_VERSION || '0.1.0',
    },

    redact: {
      paths: ['req.headers.authorization', 'req.headers.cookie'],
      remove: true,
    },

    timestamp: () => `,"timestamp":"${new Date().toISOString()}"`,

    serializers: {
      req: (req: IncomingMessage) => ({
        id:
          'requestId' in req && typeof req.requestId === 'string'
            ? req.requestId
            : undefined,
        method: req.method,
        url: req.url,
      }),
      res: (res: ServerResponse) => ({
        statusCode: res.statusCode,
      }),
    },

    autoLogging: {
      ignore: (req: IncomingMessage) => req.url === '/health',
    },

    customProps: (req: IncomingMessage) => {
      const requestId = req.headers['x-request-id'];
      return {
        requestId: typeof requestId === 'string' ? requestId : undefined,
      };
    },

    stream: multistream(buildStreams()),
  },
};
