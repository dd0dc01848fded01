import { type Logger, pino } from 'pino';

let _logger: Logger | null = null;

function getLogger(): Logger {
  // Created lazily so the stdio entry point can set PKGCACHE_TRANSPORT first
  if (!_logger) {
    const isStdioMode = process.env.PKGCACHE_TRANSPORT === 'stdio';
    const isDevelopment = process.env.NODE_ENV !== 'production';
    const isTest = process.env.NODE_ENV === 'test';

    // stdout belongs to the MCP protocol in stdio mode, so no pretty transport there
    const transport =
      isDevelopment && !isStdioMode && !isTest
        ? {
            target: 'pino-pretty',
            options: {
              colorize: true,
              translateTime: 'HH:MM:ss',
              ignore: 'pid,hostname',
              destination: 2,
            },
          }
        : undefined;

    _logger = pino(
      {
        level: process.env.LOG_LEVEL ?? (isDevelopment ? 'debug' : 'info'),
        base: {
          env: process.env.NODE_ENV ?? 'development',
        },
        transport,
      },
      transport ? undefined : process.stderr,
    );

    _logger.debug({ isStdioMode }, 'Logger initialized.');
  }
  return _logger;
}

function lazyLogger(resolve: () => Logger): Logger {
  return new Proxy({} as Logger, {
    get(_target, prop: keyof Logger) {
      const realLogger = resolve();
      const value = realLogger[prop];

      return typeof value === 'function' ? value.bind(realLogger) : value;
    },
  });
}

export const logger: Logger = lazyLogger(getLogger);

/**
 * Module-level child loggers are created on import; the real child is only
 * built on first use, after the entry point has settled LOG_LEVEL.
 */
export function createChildLogger(bindings: Record<string, unknown>): Logger {
  let child: Logger | null = null;
  return lazyLogger(() => {
    child ??= getLogger().child(bindings);
    return child;
  });
}
