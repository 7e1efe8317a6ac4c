import path from "path";
import util from "util";

import chalk from "chalk";
import { format as dateFormat } from "date-fns";
import fs from "fs-extra";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const FLUSH_INTERVAL_MS = 1000;

type LogKind = LogLevel | "success";

const LEVEL_STYLE: Record<LogKind, (text: string) => string> = {
  debug: chalk.white,
  info: chalk.cyan,
  success: chalk.green,
  warn: chalk.yellow,
  error: chalk.red,
};

class LogWriter {
  private buffer: string[] = [];
  private timer: NodeJS.Timeout | null = null;

  constructor(private readonly dir: string) {
    fs.ensureDirSync(dir);
    this.timer = setInterval(() => this.flush(), FLUSH_INTERVAL_MS);
    this.timer.unref();
  }

  push(line: string) {
    this.buffer.push(line);
  }

  flush() {
    if (this.buffer.length === 0) return;
    const lines = this.buffer.join("");
    this.buffer = [];
    const file = path.join(this.dir, `${dateFormat(new Date(), "yyyy-MM-dd")}.log`);
    try {
      fs.appendFileSync(file, lines);
    } catch (err) {
      console.error(`[logger] failed to write ${file}:`, err);
    }
  }

  close() {
    if (this.timer) clearInterval(this.timer);
    this.timer = null;
    this.flush();
  }
}

function formatParams(params: unknown[]): string {
  return params
    .map((item) => (typeof item === "string" ? item : util.inspect(item, { depth: 4, breakLength: Infinity })))
    .join(" ");
}

export class Logger {
  private level: LogLevel;
  private writer: LogWriter | null = null;

  constructor(level: LogLevel = "info") {
    this.level = level;
  }

  setLevel(level: LogLevel) {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  /**
   * Mirrors every line into a daily file under `dir`.
   * Calling it again with another directory replaces the writer.
   */
  enableFileOutput(dir: string) {
    this.writer?.close();
    this.writer = new LogWriter(path.resolve(dir));
  }

  header() {
    const line = `\n\n===================== LOG START ${dateFormat(new Date(), "yyyy-MM-dd HH:mm:ss.SSS")} =====================\n\n`;
    this.writer?.push(line);
  }

  footer() {
    const line = `\n\n===================== LOG END ${dateFormat(new Date(), "yyyy-MM-dd HH:mm:ss.SSS")} =====================\n\n`;
    this.writer?.push(line);
    this.writer?.close();
    this.writer = null;
  }

  success(...params: unknown[]) {
    this.write("success", params);
  }

  info(...params: unknown[]) {
    this.write("info", params);
  }

  debug(...params: unknown[]) {
    this.write("debug", params);
  }

  warn(...params: unknown[]) {
    this.write("warn", params);
  }

  error(...params: unknown[]) {
    this.write("error", params);
  }

  private write(kind: LogKind, params: unknown[]) {
    const rank = kind === "success" ? LEVEL_RANK.info : LEVEL_RANK[kind];
    if (rank < LEVEL_RANK[this.level]) return;
    const time = dateFormat(new Date(), "yyyy-MM-dd HH:mm:ss.SSS");
    const text = `[${time}][${kind}] ${formatParams(params)}`;
    const colored = LEVEL_STYLE[kind](text);
    if (kind === "error") console.error(colored);
    else if (kind === "warn") console.warn(colored);
    else console.log(colored);
    this.writer?.push(`${text}\n`);
  }
}

function parseLevel(value: string | undefined): LogLevel {
  if (value === "debug" || value === "info" || value === "warn" || value === "error") return value;
  return "info";
}

export default new Logger(parseLevel(process.env.LOG_LEVEL));
