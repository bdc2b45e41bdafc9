import type { Logger } from "@/application/ports/logger";

export class ConsoleLogger implements Logger {
  constructor(
    private readonly prefix: string = "BGG",
    private readonly debugEnabled: boolean = process.env.DEBUG === "true"
  ) {}

  info(message: string): void {
    console.log(`[INFO] [${this.prefix}] ${message}`);
  }

  warn(message: string): void {
    console.warn(`[WARN] [${this.prefix}] ${message}`);
  }

  error(message: string, error?: unknown): void {
    if (error instanceof Error) {
      console.error(`[ERROR] [${this.prefix}] ${message}: ${error.message}`);
    } else if (error) {
      console.error(`[ERROR] [${this.prefix}] ${message}:`, error);
    } else {
      console.error(`[ERROR] [${this.prefix}] ${message}`);
    }
  }

  debug(message: string): void {
    if (this.debugEnabled) {
      console.debug(`[DEBUG] [${this.prefix}] ${message}`);
    }
  }
}
