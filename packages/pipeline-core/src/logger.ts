/**
 * FILE PURPOSE: Level-prefixed line logging to stderr
 *
 * HOW: Same line format the worker process has always written
 *      (`INFO: ...`, `WARN: ...`, `ERROR: ...`). Components take a
 *      PipelineLogger so tests can pass `silentLogger` or a spy.
 */

export interface PipelineLogger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export function createStderrLogger(scope?: string): PipelineLogger {
  const prefix = scope ? `${scope}: ` : '';
  const write = (level: string, message: string): void => {
    process.stderr.write(`${level}: ${prefix}${message}\n`);
  };
  return {
    info: (message) => write('INFO', message),
    warn: (message) => write('WARN', message),
    error: (message) => write('ERROR', message),
  };
}

export const silentLogger: PipelineLogger = {
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
