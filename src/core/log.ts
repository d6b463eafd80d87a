export interface Logger {
  info(message: string): void;
  warn(message: string): void;
}

export class ConsoleLogger implements Logger {
  info(message: string): void {
    console.error(message);
  }

  warn(message: string): void {
    console.warn(`Warning: ${message}`);
  }
}

export class NoOpLogger implements Logger {
  info(_message: string): void {}
  warn(_message: string): void {}
}

export function createLogger(type: "stderr" | "off"): Logger {
  switch (type) {
    case "stderr":
      return new ConsoleLogger();
    case "off":
      return new NoOpLogger();
  }
}
