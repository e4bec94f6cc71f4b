import chalk from 'chalk';

export type Logger = (...data: unknown[]) => void;

/**
 * Builds the logging function used by a component: the caller's logger when
 * one was supplied, otherwise `console.log` with the component name in bold.
 */
export function makeLogger(name: string, logger?: Logger): Logger {
  if (logger) return logger;
  return (...data: unknown[]) => {
    if (typeof data[0] === 'string') {
      console.log(`${chalk.bold(name)}: ${data[0]}`, ...data.slice(1));
    } else {
      console.log(`${chalk.bold(name)}:`, ...data);
    }
  };
}

export const quietLogger: Logger = () => undefined;
