import { execFile } from "child_process";

import axios, { type AxiosResponse } from "axios";

const BROWSER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36";

const BROWSER_HEADERS: Record<string, string> = {
  Accept: "*/*",
  "Accept-Language": "en-US,en;q=0.9",
  "Accept-Encoding": "gzip, deflate, br",
  Connection: "keep-alive",
  "Sec-Fetch-Dest": "document",
  "Sec-Fetch-Mode": "navigate",
  "Sec-Fetch-Site": "none",
  "Upgrade-Insecure-Requests": "1",
  "User-Agent": BROWSER_AGENT,
};

const MAX_DOWNLOAD_BYTES = 512 * 1024 * 1024;

export class DownloadError extends Error {
  constructor(
    message: string,
    /** Upstream answered 403; worth retrying the whole chain after a pause. */
    readonly forbidden = false
  ) {
    super(message);
    this.name = "DownloadError";
  }
}

export interface Downloader {
  readonly name: string;
  /** Resolves with a non-empty payload or rejects with a DownloadError. */
  download(url: string): Promise<Buffer>;
}

export class HttpDownloader implements Downloader {
  readonly name = "http";

  constructor(private readonly timeoutMs = 60_000) {}

  async download(url: string): Promise<Buffer> {
    let response: AxiosResponse<ArrayBuffer>;
    try {
      response = await axios.get<ArrayBuffer>(url, {
        headers: BROWSER_HEADERS,
        responseType: "arraybuffer",
        timeout: this.timeoutMs,
        maxContentLength: MAX_DOWNLOAD_BYTES,
        validateStatus: () => true,
      });
    } catch (err) {
      throw new DownloadError(`http request failed: ${err instanceof Error ? err.message : String(err)}`);
    }
    if (response.status === 403) throw new DownloadError("HTTP 403 Forbidden", true);
    if (response.status !== 200) throw new DownloadError(`HTTP ${response.status}`);
    const data = Buffer.from(response.data);
    if (data.length === 0) throw new DownloadError("Downloaded file is empty");
    return data;
  }
}

export type DownloadCommand = "wget" | "curl";

function commandArgs(command: DownloadCommand, url: string, timeoutSeconds: number): string[] {
  if (command === "wget") {
    return [
      "-nv",
      "-O",
      "-",
      `--timeout=${timeoutSeconds}`,
      "--tries=3",
      `--user-agent=${BROWSER_AGENT}`,
      "--header=Accept: */*",
      "--header=Connection: keep-alive",
      url,
    ];
  }
  return [
    "-L",
    "-s",
    "-S",
    "--fail",
    "--max-time",
    String(timeoutSeconds),
    "-H",
    "Accept: */*",
    "-H",
    "Connection: keep-alive",
    "-A",
    BROWSER_AGENT,
    url,
  ];
}

/** Shells out to a system download tool, reading the payload from stdout. */
export class CommandDownloader implements Downloader {
  readonly name: DownloadCommand;

  constructor(
    command: DownloadCommand,
    private readonly timeoutMs = 60_000
  ) {
    this.name = command;
  }

  download(url: string): Promise<Buffer> {
    const args = commandArgs(this.name, url, Math.ceil(this.timeoutMs / 1000));
    return new Promise<Buffer>((resolve, reject) => {
      execFile(
        this.name,
        args,
        { encoding: "buffer", maxBuffer: MAX_DOWNLOAD_BYTES, timeout: this.timeoutMs + 30_000 },
        (error, stdout, stderr) => {
          const diagnostics = stderr.toString("utf8").trim();
          if (error) {
            const detail = diagnostics || error.message;
            reject(new DownloadError(`${this.name} failed: ${detail}`, /\b403\b/.test(detail)));
            return;
          }
          if (stdout.length === 0) {
            reject(new DownloadError(`${this.name}: downloaded file is empty`));
            return;
          }
          resolve(stdout);
        }
      );
    });
  }
}

export function defaultDownloaders(timeoutMs: number): Downloader[] {
  return [new HttpDownloader(timeoutMs), new CommandDownloader("wget", timeoutMs), new CommandDownloader("curl", timeoutMs)];
}
