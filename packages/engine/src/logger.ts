export interface Logger {
  debug: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
}

const isDebugEnabled = () =>
  process.env.NODE_ENV === 'development' || Boolean(process.env.JOBFIT_DEBUG);

/**
 * Console logger whose lines carry a `[scope]` prefix.
 * Debug output only shows in development or when JOBFIT_DEBUG is set.
 */
export function createLogger(scope: string): Logger {
  const prefix = `[${scope}]`;
  return {
    debug: (...args) => {
      if (isDebugEnabled()) {
        console.debug(prefix, ...args);
      }
    },
    info: (...args) => {
      console.info(prefix, ...args);
    },
    warn: (...args) => {
      console.warn(prefix, ...args);
    },
    error: (...args) => {
      console.error(prefix, ...args);
    },
  };
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
