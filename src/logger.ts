export type LogLevel = 'info' | 'warn' | 'error';

export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

// stdout carries command output, so log lines go to stderr
export function createStderrLogger(now: () => Date = () => new Date()): Logger {
  const write = (level: LogLevel) => (message: string) => {
    console.error(`${now().toISOString()} [${level.toUpperCase()}] ${message}`);
  };
  return { info: write('info'), warn: write('warn'), error: write('error') };
}

export const silentLogger: Logger = {
  info: () => {},
  warn: () => {},
  error: () => {},
};
