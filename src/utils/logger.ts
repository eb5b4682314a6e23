import winston from 'winston';

// Define log levels
const levels = {
  error: 0,
  warn: 1,
  info: 2,
  http: 3,
  debug: 4,
};

const colors = {
  error: 'red',
  warn: 'yellow',
  info: 'green',
  http: 'magenta',
  debug: 'white',
};

winston.addColors(colors);

const RESERVED_KEYS = ['timestamp', 'level', 'message', 'stack'];

const level = (): string => {
  if (process.env.LOG_LEVEL) {
    return process.env.LOG_LEVEL;
  }
  const env = process.env.NODE_ENV || 'development';
  return env === 'development' ? 'debug' : 'warn';
};

// One line per entry, followed by the stack and any metadata
const line = winston.format.printf((info) => {
  const meta = Object.fromEntries(
    Object.entries(info).filter(([key]) => !RESERVED_KEYS.includes(key))
  );
  const stack = typeof info.stack === 'string' ? `\n${info.stack}` : '';
  const extra = Object.keys(meta).length > 0 ? `\n${JSON.stringify(meta, null, 2)}` : '';
  return `${String(info.timestamp)} ${info.level}: ${String(info.message)}${stack}${extra}`;
});

const timestamp = winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss:ms' });

const transports: winston.transport[] = [
  new winston.transports.Console({
    level: level(),
    format: winston.format.combine(timestamp, winston.format.colorize({ all: true }), line),
  }),
];

// Add file transport if LOG_FILE is specified
if (process.env.LOG_FILE) {
  transports.push(
    new winston.transports.File({
      filename: process.env.LOG_FILE,
      level: process.env.LOG_LEVEL || 'info',
      format: winston.format.combine(timestamp, line),
    })
  );
}

export const logger = winston.createLogger({
  level: level(),
  levels,
  transports,
  silent: process.env.NODE_ENV === 'test',
});
