import winston from 'winston';

// Can load before env.config has run dotenv, so read process.env directly
const logLevel = process.env.LOG_LEVEL || 'info';
const nodeEnv = process.env.NODE_ENV || 'development';

const consoleFormat = winston.format.printf(({ level, message, timestamp, stack, ...meta }) => {
  const details = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
  const trace = typeof stack === 'string' ? `\n${stack}` : '';
  return `${timestamp} [${level}]: ${message}${details}${trace}`;
});

export const logger = winston.createLogger({
  level: logLevel,
  silent: nodeEnv === 'test',
  format: winston.format.combine(
    winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
    winston.format.errors({ stack: true }),
    nodeEnv === 'production'
      ? winston.format.json()
      : winston.format.combine(winston.format.colorize(), consoleFormat)
  ),
  transports: [new winston.transports.Console()],
});
