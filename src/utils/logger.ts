const COLORS = {
  reset: '\x1b[0m',
  gray: '\x1b[90m',
  red: '\x1b[31m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  magenta: '\x1b[35m',
  cyan: '\x1b[36m',
};

type Level = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_COLOR: Record<Level, string> = {
  debug: COLORS.blue,
  info: COLORS.cyan,
  warn: COLORS.yellow,
  error: COLORS.red,
};

export type LogFields = Record<string, string | number | bigint | undefined>;

// `[engine] deposit user=0xa11ce assetId=WETH amount=5`; undefined fields are left out.
export function formatLine(scope: string | undefined, message: string, fields: LogFields = {}): string {
  const parts = scope ? [`[${scope}]`, message] : [message];
  for (const [key, value] of Object.entries(fields)) {
    if (value !== undefined) parts.push(`${key}=${value}`);
  }
  return parts.join(' ');
}

function write(level: Level, scope: string | undefined, message: string, fields?: LogFields) {
  if (level === 'debug' && !process.env.DEBUG) return;
  const label = `${LEVEL_COLOR[level]}${level.toUpperCase()}${COLORS.reset}`;
  // eslint-disable-next-line no-console
  console.log(`${COLORS.gray}[${new Date().toISOString()}]${COLORS.reset} ${label} ${formatLine(scope, message, fields)}`);
}

export interface Logger {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
  section(title: string): void;
  scoped(scope: string): Logger;
}

function createLogger(scope?: string): Logger {
  return {
    debug: (message, fields) => write('debug', scope, message, fields),
    info: (message, fields) => write('info', scope, message, fields),
    warn: (message, fields) => write('warn', scope, message, fields),
    error: (message, fields) => write('error', scope, message, fields),
    section(title) {
      const bar = `${COLORS.magenta}==============================${COLORS.reset}`;
      // eslint-disable-next-line no-console
      console.log(`${bar}\n${COLORS.magenta}${formatLine(scope, title)}${COLORS.reset}\n${bar}`);
    },
    scoped: (child) => createLogger(scope ? `${scope}:${child}` : child),
  };
}

export const logger = createLogger();
