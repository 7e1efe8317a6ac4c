#!/usr/bin/env tsx

import process from "node:process";

import chalk from "chalk";
import minimist from "minimist";

import {
  buildAuthHeaders,
  buildChatBody,
  describeFailure,
  fail,
  failWithUsage,
  formatTime,
  getInteger,
  getSingleString,
  isRecord,
  parseSseBuffer,
  sanitizeBaseUrl,
  toImageRef,
  toStringList,
  type JsonRecord,
} from "./helpers.ts";

type CliHandler = (argv: string[]) => Promise<void>;
type UsageSection = { title: string; lines: string[] };

const BASE_URL_OPTION = "  --base-url <url>         Gateway base URL, default http://127.0.0.1:8000";
const API_KEY_OPTION = "  --api-key <key>          Gateway API key, default $API_KEY";
const ID_OPTION = "  --id <id>                Required, numeric id";
const HELP_OPTION = "  --help                   Show help";
const COMMON_STRINGS = ["base-url", "api-key"];

function buildUsageText(usageLine: string, options: string[], sections?: UsageSection[]): string {
  const lines = ["Usage:", usageLine, "", "Options:", ...options];
  for (const section of sections ?? []) lines.push("", section.title, ...section.lines);
  return lines.join("\n");
}

interface Connection {
  baseUrl: string;
  headers: Record<string, string>;
}

function connection(args: JsonRecord): Connection {
  return {
    baseUrl: sanitizeBaseUrl(getSingleString(args, "base-url") ?? process.env.GATEWAY_BASE_URL),
    headers: buildAuthHeaders(getSingleString(args, "api-key") ?? process.env.API_KEY),
  };
}

async function requestJson(conn: Connection, method: string, uri: string, body?: unknown): Promise<unknown> {
  const response = await fetch(`${conn.baseUrl}${uri}`, {
    method,
    headers: { ...conn.headers, ...(body === undefined ? {} : { "Content-Type": "application/json" }) },
    body: body === undefined ? undefined : JSON.stringify(body),
  });
  const text = await response.text();
  let payload: unknown = {};
  try {
    payload = text ? JSON.parse(text) : {};
  } catch {
    fail(`Non-JSON response (${response.status}): ${text.slice(0, 500)}`);
  }
  if (!response.ok) fail(describeFailure(response.status, payload));
  return payload;
}

function dataOf(payload: unknown): unknown[] {
  return isRecord(payload) && Array.isArray(payload.data) ? payload.data : [];
}

function requireId(args: JsonRecord, usage: string): number {
  const id = getInteger(args, "id");
  if (id === undefined) failWithUsage("Missing required --id.", usage);
  return id;
}

function printJson(value: unknown) {
  console.log(JSON.stringify(value, null, 2));
}

async function handleModelsList(argv: string[]): Promise<void> {
  const args = minimist(argv, { string: COMMON_STRINGS, boolean: ["help", "json", "verbose"] });
  const usage = buildUsageText("  flow-gateway models list [options]", [
    "  --verbose                Print type and description",
    "  --json                   Print full JSON response",
    BASE_URL_OPTION,
    API_KEY_OPTION,
    HELP_OPTION,
  ]);
  if (args.help) return console.log(usage);

  const payload = await requestJson(connection(args), "GET", "/v1/models");
  if (args.json) return printJson(payload);
  const models = dataOf(payload).filter(isRecord);
  if (models.length === 0) fail(`No models found in response: ${JSON.stringify(payload)}`);
  for (const model of models) {
    if (typeof model.id !== "string") continue;
    if (!args.verbose) {
      console.log(model.id);
      continue;
    }
    const images = typeof model.images === "string" ? `\timages=${model.images}` : "";
    console.log(`${model.id}\ttype=${String(model.model_type)}${images}\tdesc=${String(model.description)}`);
  }
}

function printTokenTable(items: JsonRecord[]) {
  if (items.length === 0) {
    console.log("(empty)");
    return;
  }
  console.log("id\temail\tactive\tban\tcredits\tuses\terrors\tlastUsedAt");
  for (const token of items) {
    const stats = isRecord(token.stats) ? token.stats : {};
    const active = token.isActive === true ? chalk.green("yes") : chalk.red("no");
    console.log(
      [
        token.id,
        token.email || "-",
        active,
        token.banReason ?? "-",
        token.credits ?? "-",
        token.useCount ?? 0,
        `${String(stats.consecutiveErrorCount ?? 0)}/${String(stats.errorCount ?? 0)}`,
        formatTime(token.lastUsedAt),
      ]
        .map(String)
        .join("\t")
    );
  }
}

async function handleTokenList(argv: string[]): Promise<void> {
  const args = minimist(argv, { string: COMMON_STRINGS, boolean: ["help", "json"] });
  if (args.help) return console.log(usageTokenSubcommand("list"));
  const payload = await requestJson(connection(args), "GET", "/token");
  if (args.json) return printJson(payload);
  if (isRecord(payload)) console.log(`Tokens: total=${String(payload.total)} active=${String(payload.active)}`);
  printTokenTable(dataOf(payload).filter(isRecord));
}

async function handleTokenAdd(argv: string[]): Promise<void> {
  const args = minimist(argv, {
    string: [...COMMON_STRINGS, "session", "name", "remark", "project-id", "image-concurrency", "video-concurrency"],
    boolean: ["help", "image", "video"],
    default: { image: true, video: true },
  });
  const usage = usageTokenSubcommand("add");
  if (args.help) return console.log(usage);
  const sessions = toStringList(args.session);
  if (sessions.length === 0) failWithUsage("Missing required --session.", usage);

  const conn = connection(args);
  let failures = 0;
  for (const sessionCredential of sessions) {
    try {
      const payload = await requestJson(conn, "POST", "/token", {
        sessionCredential,
        name: getSingleString(args, "name"),
        remark: getSingleString(args, "remark"),
        projectId: getSingleString(args, "project-id"),
        imageEnabled: Boolean(args.image),
        videoEnabled: Boolean(args.video),
        imageConcurrency: getInteger(args, "image-concurrency"),
        videoConcurrency: getInteger(args, "video-concurrency"),
      });
      const token = isRecord(payload) && isRecord(payload.data) ? payload.data : {};
      console.log(`[OK]    token ${String(token.id)} ${String(token.email || "")}`);
    } catch (error) {
      failures += 1;
      console.log(`[ERROR] ${error instanceof Error ? error.message : String(error)}`);
    }
  }
  console.log(`Summary: total=${sessions.length} failed=${failures}`);
  if (failures > 0) process.exit(2);
}

function tokenAction(name: TokenSubcommandName, method: string, uri: (id: number) => string): CliHandler {
  return async (argv) => {
    const args = minimist(argv, { string: [...COMMON_STRINGS, "id"], boolean: ["help"] });
    const usage = usageTokenSubcommand(name);
    if (args.help) return console.log(usage);
    const id = requireId(args, usage);
    printJson(await requestJson(connection(args), method, uri(id)));
  };
}

async function handleTokenRemove(argv: string[]): Promise<void> {
  const args = minimist(argv, { string: [...COMMON_STRINGS, "id"], boolean: ["help", "delete-projects"] });
  const usage = usageTokenSubcommand("remove");
  if (args.help) return console.log(usage);
  const id = requireId(args, usage);
  const query = args["delete-projects"] ? "?deleteProjects=true" : "";
  printJson(await requestJson(connection(args), "DELETE", `/token/${id}${query}`));
}

async function handleTokenRefresh(argv: string[]): Promise<void> {
  const args = minimist(argv, { string: [...COMMON_STRINGS, "id"], boolean: ["help", "credits"] });
  const usage = usageTokenSubcommand("refresh");
  if (args.help) return console.log(usage);
  const id = requireId(args, usage);
  const conn = connection(args);
  printJson(await requestJson(conn, "POST", `/token/${id}/refresh-at`));
  if (args.credits) printJson(await requestJson(conn, "POST", `/token/${id}/refresh-credits`));
}

type TokenSubcommandName = "list" | "add" | "remove" | "enable" | "disable" | "refresh";

type TokenSubcommandDef = {
  name: TokenSubcommandName;
  description: string;
  usageLine: string;
  options: string[];
  sections?: UsageSection[];
  handler: CliHandler;
};

const TOKEN_SUBCOMMANDS: TokenSubcommandDef[] = [
  {
    name: "list",
    description: "List tokens with usage and error counters",
    usageLine: "  flow-gateway token list [options]",
    options: ["  --json                   Output raw JSON", BASE_URL_OPTION, API_KEY_OPTION, HELP_OPTION],
    handler: handleTokenList,
  },
  {
    name: "add",
    description: "Add token(s) from session credentials",
    usageLine: "  flow-gateway token add --session <credential> [--session <credential> ...] [options]",
    options: [
      "  --session <credential>   Session credential, can be repeated",
      "  --name <name>            Optional display name",
      "  --remark <text>          Optional remark",
      "  --project-id <id>        Optional existing project to bind",
      "  --image-concurrency <n>  Optional, -1 for unlimited",
      "  --video-concurrency <n>  Optional, -1 for unlimited",
      "  --no-image               Disable image generation for the token",
      "  --no-video               Disable video generation for the token",
      BASE_URL_OPTION,
      API_KEY_OPTION,
      HELP_OPTION,
    ],
    handler: handleTokenAdd,
  },
  {
    name: "remove",
    description: "Delete a token",
    usageLine: "  flow-gateway token remove --id <id> [--delete-projects] [options]",
    options: [
      ID_OPTION,
      "  --delete-projects        Also delete the token's upstream projects",
      BASE_URL_OPTION,
      API_KEY_OPTION,
      HELP_OPTION,
    ],
    handler: handleTokenRemove,
  },
  {
    name: "enable",
    description: "Enable a token and clear its ban",
    usageLine: "  flow-gateway token enable --id <id> [options]",
    options: [ID_OPTION, BASE_URL_OPTION, API_KEY_OPTION, HELP_OPTION],
    handler: tokenAction("enable", "POST", (id) => `/token/${id}/enable`),
  },
  {
    name: "disable",
    description: "Disable a token",
    usageLine: "  flow-gateway token disable --id <id> [options]",
    options: [ID_OPTION, BASE_URL_OPTION, API_KEY_OPTION, HELP_OPTION],
    handler: tokenAction("disable", "POST", (id) => `/token/${id}/disable`),
  },
  {
    name: "refresh",
    description: "Refresh a token's access credential",
    usageLine: "  flow-gateway token refresh --id <id> [--credits] [options]",
    options: [ID_OPTION, "  --credits                Also refresh the credit balance", BASE_URL_OPTION, API_KEY_OPTION, HELP_OPTION],
    handler: handleTokenRefresh,
  },
];

function usageTokenSubcommand(name: TokenSubcommandName): string {
  const subcommand = TOKEN_SUBCOMMANDS.find((item) => item.name === name);
  if (!subcommand) return usageTokenRoot();
  return buildUsageText(subcommand.usageLine, subcommand.options, subcommand.sections);
}

function usageTokenRoot(): string {
  return [
    "Usage:",
    "  flow-gateway token <subcommand> [options]",
    "",
    "Subcommands:",
    ...TOKEN_SUBCOMMANDS.map((subcommand) => `  ${subcommand.name.padEnd(24)}${subcommand.description}`),
    "",
    "Run `flow-gateway token <subcommand> --help` for details.",
  ].join("\n");
}

async function handleProxyList(argv: string[]): Promise<void> {
  const args = minimist(argv, { string: COMMON_STRINGS, boolean: ["help", "json"] });
  if (args.help) {
    return console.log(buildUsageText("  flow-gateway proxy list [options]", [BASE_URL_OPTION, API_KEY_OPTION, HELP_OPTION]));
  }
  const conn = connection(args);
  const settings = await requestJson(conn, "GET", "/proxy/config");
  const pool = await requestJson(conn, "GET", "/proxy/pool");
  if (args.json) return printJson({ settings, pool: dataOf(pool) });
  console.log(`Settings: ${JSON.stringify(settings)}`);
  const items = dataOf(pool).filter(isRecord);
  if (items.length === 0) return console.log("(empty pool)");
  console.log("id\tenabled\tsuccess\tfail\tlastUsedAt\turl");
  for (const item of items) {
    console.log(
      [item.id, item.enabled, item.successCount, item.failCount, formatTime(item.lastUsedAt), item.proxyUrl].map(String).join("\t")
    );
  }
}

async function handleProxyAdd(argv: string[]): Promise<void> {
  const args = minimist(argv, { string: [...COMMON_STRINGS, "url", "name"], boolean: ["help"] });
  const usage = buildUsageText("  flow-gateway proxy add --url <proxy_url> [options]", [
    "  --url <proxy_url>        Required, http(s) proxy, can be repeated",
    "  --name <name>            Optional label",
    BASE_URL_OPTION,
    API_KEY_OPTION,
    HELP_OPTION,
  ]);
  if (args.help) return console.log(usage);
  const urls = toStringList(args.url);
  if (urls.length === 0) failWithUsage("Missing required --url.", usage);
  const conn = connection(args);
  for (const proxyUrl of urls) {
    printJson(await requestJson(conn, "POST", "/proxy/pool", { proxyUrl, name: getSingleString(args, "name") }));
  }
}

async function handleProxyRemove(argv: string[]): Promise<void> {
  const args = minimist(argv, { string: [...COMMON_STRINGS, "id"], boolean: ["help"] });
  const usage = buildUsageText("  flow-gateway proxy remove --id <id> [options]", [ID_OPTION, BASE_URL_OPTION, API_KEY_OPTION, HELP_OPTION]);
  if (args.help) return console.log(usage);
  printJson(await requestJson(connection(args), "DELETE", `/proxy/pool/${requireId(args, usage)}`));
}

function usageGenerate(): string {
  return buildUsageText(
    "  flow-gateway generate --model <model> --prompt <text> [--image <path_or_url> ...] [options]",
    [
      "  --model <model>          Required, see `flow-gateway models list`",
      "  --prompt <text>          Required",
      "  --image <path_or_url>    Reference image, can be repeated",
      "  --stream                 Print progress while generating",
      BASE_URL_OPTION,
      API_KEY_OPTION,
      HELP_OPTION,
    ],
    [{ title: "Notes:", lines: ["  - Local image files are sent inline as data URLs."] }]
  );
}

async function streamCompletion(conn: Connection, body: unknown): Promise<void> {
  const response = await fetch(`${conn.baseUrl}/v1/chat/completions`, {
    method: "POST",
    headers: { ...conn.headers, "Content-Type": "application/json" },
    body: JSON.stringify(body),
  });
  if (!response.ok || !response.body) {
    const text = await response.text();
    let payload: unknown = text;
    try {
      payload = JSON.parse(text);
    } catch {
      // keep the raw text
    }
    fail(describeFailure(response.status, payload));
  }
  const decoder = new TextDecoder();
  let buffer = "";
  let failed: string | null = null;
  for await (const chunk of response.body) {
    buffer += decoder.decode(chunk, { stream: true });
    const { pieces, rest } = parseSseBuffer(buffer);
    buffer = rest;
    for (const piece of pieces) {
      if (piece.kind === "reasoning") process.stderr.write(chalk.gray(piece.text));
      else if (piece.kind === "content") process.stdout.write(`${piece.text}\n`);
      else failed = piece.message;
    }
  }
  if (failed) fail(failed);
}

async function handleGenerate(argv: string[]): Promise<void> {
  const args = minimist(argv, { string: [...COMMON_STRINGS, "model", "prompt", "image"], boolean: ["help", "stream"] });
  const usage = usageGenerate();
  if (args.help) return console.log(usage);
  const model = getSingleString(args, "model");
  const prompt = getSingleString(args, "prompt");
  if (!model) failWithUsage("Missing required --model.", usage);
  if (!prompt) failWithUsage("Missing required --prompt.", usage);

  const imageRefs: string[] = [];
  for (const input of toStringList(args.image)) imageRefs.push(await toImageRef(input));
  const conn = connection(args);
  const body = buildChatBody(model, prompt, imageRefs, Boolean(args.stream));
  if (args.stream) return streamCompletion(conn, body);

  const payload = await requestJson(conn, "POST", "/v1/chat/completions", body);
  const choice = isRecord(payload) && Array.isArray(payload.choices) ? payload.choices[0] : undefined;
  const message = isRecord(choice) && isRecord(choice.message) ? choice.message.content : undefined;
  if (typeof message !== "string") fail(`Unexpected response: ${JSON.stringify(payload)}`);
  console.log(message);
}

async function handleServe(): Promise<void> {
  const { startService } = await import("@/lib/start-service.ts");
  const service = await startService();
  const shutdown = (signal: string) => {
    console.log(`Received ${signal}, shutting down`);
    service
      .stop()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        console.error(`Shutdown failed: ${error instanceof Error ? error.message : String(error)}`);
        process.exit(1);
      });
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));
}

type CommandSubcommandDef = { name: string; description: string; handler: CliHandler };

type CommandSpec = {
  name: string;
  description: string;
  handler?: CliHandler;
  subcommands?: CommandSubcommandDef[];
  usage?: () => string;
  showAsGrouped?: boolean;
};

const COMMAND_SPECS: CommandSpec[] = [
  { name: "serve", description: "Start the gateway (--env, --host, --port)", handler: handleServe },
  {
    name: "models",
    description: "Model commands",
    subcommands: [{ name: "list", description: "List available models", handler: handleModelsList }],
  },
  {
    name: "token",
    description: "Token management commands",
    subcommands: TOKEN_SUBCOMMANDS,
    usage: usageTokenRoot,
    showAsGrouped: true,
  },
  {
    name: "proxy",
    description: "Proxy pool commands",
    subcommands: [
      { name: "list", description: "Show proxy settings and pool", handler: handleProxyList },
      { name: "add", description: "Add proxies to the pool", handler: handleProxyAdd },
      { name: "remove", description: "Remove a proxy from the pool", handler: handleProxyRemove },
    ],
  },
  { name: "generate", description: "Generate an image or video through the gateway", handler: handleGenerate },
];

const ROOT_COMMAND_ENTRIES = COMMAND_SPECS.flatMap((spec) => {
  if (spec.handler || !spec.subcommands || spec.subcommands.length === 0) {
    return [{ path: spec.name, description: spec.description }];
  }
  if (spec.showAsGrouped) return [{ path: `${spec.name} <subcommand>`, description: spec.description }];
  return spec.subcommands.map((subcommand) => ({
    path: `${spec.name} ${subcommand.name}`,
    description: subcommand.description,
  }));
});

function usageRoot(): string {
  return [
    "Usage:",
    "  flow-gateway <command> [subcommand] [options]",
    "",
    "Commands:",
    ...ROOT_COMMAND_ENTRIES.map((entry) => `  ${entry.path.padEnd(32)}${entry.description}`),
    "",
    "Run `flow-gateway <command> --help` for command details.",
  ].join("\n");
}

function isHelpKeyword(value: string | undefined): boolean {
  return value === "--help" || value === "-h" || value === "help";
}

async function run(): Promise<void> {
  const [command, subcommand, ...rest] = process.argv.slice(2);
  if (!command || isHelpKeyword(command)) {
    console.log(usageRoot());
    return;
  }
  const spec = COMMAND_SPECS.find((item) => item.name === command);
  if (!spec) failWithUsage(`Unknown command: ${command}`, usageRoot());

  if (spec.handler) {
    await spec.handler(process.argv.slice(3));
    return;
  }
  const usage = spec.usage ? spec.usage() : usageRoot();
  if (!subcommand || isHelpKeyword(subcommand)) {
    console.log(usage);
    return;
  }
  const handler = spec.subcommands?.find((item) => item.name === subcommand)?.handler;
  if (!handler) failWithUsage(`Unknown ${command} subcommand: ${subcommand}`, usage);
  await handler(rest);
}

run().catch((error: unknown) => {
  console.error(chalk.red(`Error: ${error instanceof Error ? error.message : String(error)}`));
  process.exit(1);
});
