export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export const consoleLogger: Logger = {
  info: (message) => console.log(`[i] ${message}`),
  warn: (message) => console.warn(`[!] ${message}`),
  error: (message) => console.error(`[!] ${message}`)
};

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
