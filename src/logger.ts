import fs from "node:fs";
import path from "node:path";

type LogLevel = "info" | "warn" | "error";

export type LoggerConfig = {
  logPath: string;
  echo?: boolean;
};

function encodeValue(_key: string, value: unknown): unknown {
  return typeof value === "bigint" ? value.toString() : value;
}

export class AppLogger {
  private readonly logPath: string;
  private readonly echo: boolean;

  constructor(config: LoggerConfig) {
    this.logPath = config.logPath;
    this.echo = config.echo ?? true;
    const dir = path.dirname(this.logPath);
    fs.mkdirSync(dir, { recursive: true });
  }

  info(event: string, payload?: Record<string, unknown>): void {
    this.write("info", event, payload);
  }

  warn(event: string, payload?: Record<string, unknown>): void {
    this.write("warn", event, payload);
  }

  error(event: string, payload?: Record<string, unknown>): void {
    this.write("error", event, payload);
  }

  private write(level: LogLevel, event: string, payload?: Record<string, unknown>): void {
    const entry = {
      ts: new Date().toISOString(),
      level,
      event,
      ...(payload ? { payload } : {}),
    };
    const line = `${JSON.stringify(entry, encodeValue)}\n`;
    fs.appendFileSync(this.logPath, line, "utf8");
    if (this.echo) {
      // eslint-disable-next-line no-console
      console.log(line.trim());
    }
  }
}
