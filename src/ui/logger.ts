export interface Logger {
  info(message: string): void;
  detail(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export function createConsoleLogger(): Logger {
  return {
    info: (message) => console.log(message),
    detail: (message) => console.log(`  ${message}`),
    success: (message) => console.log(`OK ${message}`),
    warn: (message) => console.log(`WARN ${message}`),
    error: (message) => console.error(message)
  };
}

export function createSilentLogger(): Logger {
  const noop = (): void => undefined;
  return { info: noop, detail: noop, success: noop, warn: noop, error: noop };
}
