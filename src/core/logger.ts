export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

/**
 * Writes diagnostics to stderr so stdout only ever carries documents.
 */
export class ConsoleLogger implements Logger {
  constructor(private readonly prefix: string = '[filemeta]') {}

  info(message: string): void {
    console.error(`${this.prefix} ${message}`);
  }

  warn(message: string): void {
    console.warn(`${this.prefix} warning: ${message}`);
  }

  error(message: string): void {
    console.error(`${this.prefix} error: ${message}`);
  }
}

export const defaultLogger = new ConsoleLogger();
