import * as fs from "fs";
import * as path from "path";

export type LogLevel = "SYSTEM" | "INFO" | "WARN" | "ERROR" | "DEBUG";

export interface LoggerOptions {
  logDir?: string;
  writeToFile?: boolean;
}

export class Logger {
  private logFilePath: string | null = null;

  constructor(options: LoggerOptions = {}) {
    if (options.writeToFile === false) return;

    // 每个进程一个文件: logs/log_YYYY-MM-DD_HH-mm-ss.log
    const logsDir = options.logDir ?? path.join(process.cwd(), "logs");
    if (!fs.existsSync(logsDir)) {
      fs.mkdirSync(logsDir, { recursive: true });
    }

    const timestamp = this.formatDateForFilename(new Date());
    this.logFilePath = path.join(logsDir, `log_${timestamp}.log`);

    this.write("SYSTEM", `Logger initialized. Log file: ${this.logFilePath}`);
  }

  private formatDateForFilename(date: Date): string {
    const pad = (n: number) => n.toString().padStart(2, "0");
    const yyyy = date.getFullYear();
    const MM = pad(date.getMonth() + 1);
    const dd = pad(date.getDate());
    const HH = pad(date.getHours());
    const mm = pad(date.getMinutes());
    const ss = pad(date.getSeconds());
    return `${yyyy}-${MM}-${dd}_${HH}-${mm}-${ss}`;
  }

  public formatMessage(level: LogLevel, message: string): string {
    const now = new Date().toISOString();
    return `[${now}] [${level}] ${message}`;
  }

  private write(level: LogLevel, message: string) {
    const formatted = this.formatMessage(level, message);

    console.log(formatted);

    if (!this.logFilePath) return;

    // 同步写入，批处理中途退出也不丢日志
    try {
      fs.appendFileSync(this.logFilePath, formatted + "\n");
    } catch (err) {
      console.error("Failed to write to log file:", err);
    }
  }

  public info(message: string) {
    this.write("INFO", message);
  }

  public warn(message: string) {
    this.write("WARN", message);
  }

  public error(message: string, error?: unknown) {
    let msg = message;
    if (error !== undefined) {
      msg += ` | Error: ${describeError(error)}`;
      if (error instanceof Error && error.stack) {
        msg += `\nStack: ${error.stack}`;
      }
    }
    this.write("ERROR", msg);
  }

  public debug(message: string) {
    this.write("DEBUG", message);
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export const logger = new Logger({
  logDir: process.env.LOG_DIR || undefined,
  writeToFile: process.env.LOG_TO_FILE !== "false",
});
