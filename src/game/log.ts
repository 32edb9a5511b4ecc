type LogMethod = (message: string, ...details: unknown[]) => void;

export type Logger = {
  debug: LogMethod;
  info: LogMethod;
  warn: LogMethod;
  error: LogMethod;
};

export const createLogger = (scope: string, verbose: boolean = import.meta.env.DEV): Logger => {
  const prefix = `[mole-attack:${scope}]`;
  return {
    debug: (message, ...details) => {
      if (verbose) console.debug(prefix, message, ...details);
    },
    info: (message, ...details) => console.info(prefix, message, ...details),
    warn: (message, ...details) => console.warn(prefix, message, ...details),
    error: (message, ...details) => console.error(prefix, message, ...details),
  };
};
