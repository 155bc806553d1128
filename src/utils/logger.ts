import pino from 'pino';

let logger: pino.Logger | undefined;

export function createLogger(level = 'info'): pino.Logger {
  if (logger) {
    logger.level = level;
    return logger;
  }

  logger = pino({
    level,
    transport: {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'HH:MM:ss',
        ignore: 'pid,hostname',
        // stdout is reserved for report output (`visualize --stdout`)
        destination: 2,
      },
    },
  });

  return logger;
}

export function getLogger(): pino.Logger {
  return logger ?? createLogger(process.env.LOG_LEVEL ?? 'info');
}
