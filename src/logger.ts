import pino from 'pino';

/**
 * Root logger. Writes to stderr: stdout carries the MCP stdio transport.
 */
let rootLogger: pino.Logger | null = null;

export function initLogger(options: { level?: string } = {}): pino.Logger {
  rootLogger = pino(
    {
      name: 'zotero-comfort',
      level: options.level ?? 'info',
    },
    pino.destination(2)
  );
  return rootLogger;
}

/**
 * Get a component logger. Creates an info-level root logger on first use.
 */
export function getLogger(component?: string): pino.Logger {
  if (!rootLogger) {
    rootLogger = initLogger({ level: process.env.LOG_LEVEL });
  }
  return component ? rootLogger.child({ component }) : rootLogger;
}
