import pino from 'pino';

function buildTransport(): pino.TransportSingleOptions | undefined {
  if (process.env.NODE_ENV === 'development') {
    return { target: 'pino-pretty', options: { colorize: true } };
  }
  return undefined;
}

export const logger = pino({
  level: process.env.LOG_LEVEL || 'info',
  transport: buildTransport(),
});
