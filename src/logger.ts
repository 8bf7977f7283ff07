export interface Logger {
  debug: (message: string, data?: Record<string, unknown>) => void;
  info: (message: string, data?: Record<string, unknown>) => void;
  warn: (message: string, data?: Record<string, unknown>) => void;
  error: (message: string, data?: Record<string, unknown>) => void;
}

/**
 * Everything goes to stderr: stdout carries MCP frames in stdio mode and
 * command output for the CLI.
 */
export function createLogger(debugEnabled: boolean, prefix: string = '[hl]'): Logger {
  const log = (level: 'debug' | 'info' | 'warn' | 'error') => {
    return (message: string, data?: Record<string, unknown>) => {
      if (level === 'debug' && !debugEnabled) {
        return;
      }
      const line = `${prefix} ${level}: ${message}`;
      if (data) {
        console.error(line, data);
      } else {
        console.error(line);
      }
    };
  };

  return {
    debug: log('debug'),
    info: log('info'),
    warn: log('warn'),
    error: log('error')
  };
}
