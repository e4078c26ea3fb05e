type Namespace = 'Cli' | 'Config' | 'Convert' | 'Watch';

export interface Logger {
  info(msg: string): void;
  warn(msg: string): void;
  error(msg: string, err?: unknown): void;
}

export function createLogger(namespace: Namespace): Logger {
  const prefix = `[uplang:${namespace}]`;
  return {
    info: (msg: string) => console.debug(`${prefix} ${msg}`),
    warn: (msg: string) => console.warn(`${prefix} ${msg}`),
    error: (msg: string, err?: unknown) =>
      err ? console.error(`${prefix} ${msg}`, err) : console.error(`${prefix} ${msg}`),
  };
}
