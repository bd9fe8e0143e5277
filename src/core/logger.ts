export type Logger = (message: string, extra?: Record<string, unknown>) => void;

/**
 * Logger for scripts and examples. Warnings and skips go to console.warn.
 */
export const consoleLogger: Logger = (message, extra) => {
  const line = extra ? `[${message}] ${JSON.stringify(extra)}` : `[${message}]`;
  if (/(skipped|missing|unmatched|invalid|failed)/.test(message)) {
    console.warn(line);
  } else {
    console.info(line);
  }
};
