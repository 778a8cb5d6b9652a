import { format, LoggerOptions, transports } from 'winston';

export function getWinstonLoggerOption(
  nodeEnv = process.env.NODE_ENV,
): LoggerOptions {
  const isLocalEnv = !nodeEnv || nodeEnv === 'local';
  const level = isLocalEnv ? 'debug' : 'info';

  return {
    level,
    silent: nodeEnv === 'test',
    transports: [
      new transports.Console({
        level,
        format: isLocalEnv ? getLocalFormat() : getProductionFormat(),
      }),
    ],
  };
}

function getLocalFormat() {
  return format.combine(
    format.printf(({ level, message, stack }) =>
      [`[${level}] ${String(message)}`, stack].filter(Boolean).join('\n'),
    ),
  );
}

function getProductionFormat() {
  return format.combine(
    format.timestamp({
      format: 'YYYY-MM-DD HH:mm:ss',
    }),
    format.ms(),
    format.json(),
  );
}
