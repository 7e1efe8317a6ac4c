import path from "path";

import dotenv from "dotenv";
import fs from "fs-extra";
import _ from "lodash";
import yaml from "yaml";
import { z } from "zod";

import environment from "@/lib/environment.ts";
import logger from "@/lib/logger.ts";
import util from "@/lib/util.ts";

const booleanish = z.preprocess((value) => {
  if (typeof value !== "string") return value;
  const normalized = value.trim().toLowerCase();
  if (["1", "true", "yes", "on"].includes(normalized)) return true;
  if (["0", "false", "no", "off"].includes(normalized)) return false;
  return value;
}, z.boolean());

const optionalString = z.preprocess((value) => {
  if (value === null) return undefined;
  if (typeof value !== "string") return value;
  const trimmed = value.trim();
  return trimmed.length === 0 ? undefined : trimmed;
}, z.string().optional());

const serviceSchema = z
  .object({
    name: z.string().default("flow-gateway"),
    host: z.string().default("0.0.0.0"),
    port: z.coerce.number().int().min(1).max(65535).default(8000),
    /** Public base URL used when building links to cached files. */
    baseUrl: optionalString,
    apiKey: optionalString,
  })
  .default({});

const upstreamSchema = z
  .object({
    labsBaseUrl: z.string().url().default("https://labs.google/fx/api"),
    apiBaseUrl: z.string().url().default("https://aisandbox-pa.googleapis.com/v1"),
    timeoutMs: z.coerce.number().int().positive().default(120_000),
  })
  .default({});

const tokensSchema = z
  .object({
    errorBanThreshold: z.coerce.number().int().min(1).default(3),
    accessRefreshMarginSeconds: z.coerce.number().int().min(0).default(3600),
    credentialRecovery: z.enum(["none", "renewer"]).default("none"),
    defaultPaygateTier: z.string().default("PAYGATE_TIER_ONE"),
  })
  .default({});

const generationSchema = z
  .object({
    imageTimeoutSeconds: z.coerce.number().int().positive().default(300),
    pollIntervalMs: z.coerce.number().int().min(0).default(3000),
    maxPollAttempts: z.coerce.number().int().min(1).default(500),
    progressEvery: z.coerce.number().int().min(1).default(7),
    markTaskFailedOnTimeout: booleanish.default(false),
  })
  .default({});

const cacheSchema = z
  .object({
    enabled: booleanish.default(false),
    dir: z.string().default("tmp"),
    timeoutSeconds: z.coerce.number().int().positive().default(7200),
    sweepIntervalMs: z.coerce.number().int().positive().default(300_000),
    forbiddenRetries: z.coerce.number().int().min(1).default(3),
    forbiddenBackoffMs: z.coerce.number().int().min(0).default(1000),
    downloadTimeoutMs: z.coerce.number().int().positive().default(60_000),
  })
  .default({});

const proxySchema = z
  .object({
    enabled: booleanish.default(false),
    url: optionalString,
    poolEnabled: booleanish.default(false),
  })
  .default({});

const captchaSchema = z
  .object({
    method: z.enum(["none", "remote"]).default("none"),
    apiKey: optionalString,
    baseUrl: z.string().url().default("https://api.yescaptcha.com"),
    websiteKey: z.string().default(""),
    pageAction: z.string().default("FLOW_GENERATION"),
    pollAttempts: z.coerce.number().int().min(1).default(40),
    pollIntervalMs: z.coerce.number().int().min(0).default(3000),
  })
  .default({});

const logSchema = z
  .object({
    level: z.enum(["debug", "info", "warn", "error"]).default("info"),
    dir: z.string().default("logs"),
    fileOutput: booleanish.default(true),
  })
  .default({});

const registrySchema = z
  .object({
    file: z.string().default("data/registry.json"),
  })
  .default({});

export const configSchema = z.object({
  service: serviceSchema,
  upstream: upstreamSchema,
  tokens: tokensSchema,
  generation: generationSchema,
  cache: cacheSchema,
  proxy: proxySchema,
  captcha: captchaSchema,
  log: logSchema,
  registry: registrySchema,
});

export type AppConfig = z.infer<typeof configSchema>;

export type DeepPartial<T> = {
  [K in keyof T]?: T[K] extends object ? DeepPartial<T[K]> : T[K];
};

/** Environment variable -> config path. Later sources win over the yaml file. */
const ENV_OVERRIDES: Record<string, string> = {
  SERVER_NAME: "service.name",
  SERVER_HOST: "service.host",
  SERVER_PORT: "service.port",
  SERVICE_BASE_URL: "service.baseUrl",
  API_KEY: "service.apiKey",
  UPSTREAM_LABS_BASE_URL: "upstream.labsBaseUrl",
  UPSTREAM_API_BASE_URL: "upstream.apiBaseUrl",
  UPSTREAM_TIMEOUT_MS: "upstream.timeoutMs",
  ERROR_BAN_THRESHOLD: "tokens.errorBanThreshold",
  CREDENTIAL_RECOVERY: "tokens.credentialRecovery",
  POLL_INTERVAL_MS: "generation.pollIntervalMs",
  MAX_POLL_ATTEMPTS: "generation.maxPollAttempts",
  MARK_TASK_FAILED_ON_TIMEOUT: "generation.markTaskFailedOnTimeout",
  CACHE_ENABLED: "cache.enabled",
  CACHE_DIR: "cache.dir",
  CACHE_TIMEOUT_SECONDS: "cache.timeoutSeconds",
  PROXY_ENABLED: "proxy.enabled",
  PROXY_URL: "proxy.url",
  PROXY_POOL_ENABLED: "proxy.poolEnabled",
  CAPTCHA_METHOD: "captcha.method",
  CAPTCHA_API_KEY: "captcha.apiKey",
  CAPTCHA_BASE_URL: "captcha.baseUrl",
  CAPTCHA_WEBSITE_KEY: "captcha.websiteKey",
  LOG_LEVEL: "log.level",
  LOG_DIR: "log.dir",
  REGISTRY_FILE: "registry.file",
};

/** Partial config written by admins; `null` clears an optional value. */
export type ConfigPatch = {
  [S in keyof AppConfig]?: { [K in keyof AppConfig[S]]?: AppConfig[S][K] | null };
};

export type ConfigSource = () => unknown;

/** Where admin overrides survive a restart. */
export interface SettingsStore {
  getSettings(): Promise<Record<string, unknown>>;
  saveSettings(settings: Record<string, unknown>): Promise<void>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return _.isPlainObject(value);
}

/**
 * Reads configs/<env>/service.yml (when present), then applies environment
 * overrides and the command line host/port.
 */
export function loadConfigSource(env: string = environment.env): Record<string, unknown> {
  dotenv.config();
  const filePath = path.resolve("configs", env, "service.yml");
  let fromFile: Record<string, unknown> = {};
  if (fs.pathExistsSync(filePath)) {
    const parsed: unknown = yaml.parse(fs.readFileSync(filePath, "utf8"));
    if (isRecord(parsed)) fromFile = parsed;
  }
  const merged: Record<string, unknown> = _.cloneDeep(fromFile);
  for (const [name, target] of Object.entries(ENV_OVERRIDES)) {
    const value = process.env[name];
    if (_.isString(value) && value.length > 0) _.set(merged, target, value);
  }
  if (environment.name) _.set(merged, "service.name", environment.name);
  if (environment.host) _.set(merged, "service.host", environment.host);
  if (environment.port) _.set(merged, "service.port", environment.port);
  return merged;
}

export function parseConfig(raw: unknown): AppConfig {
  return configSchema.parse(raw ?? {});
}

/**
 * Versioned holder for the whole configuration. Every mutation goes through
 * replace/update/apply/reload and bumps the version, so readers that call
 * get() per operation always see the last write.
 *
 * Layers, lowest first: schema defaults, the source (yaml + environment),
 * admin overrides. Overrides are kept across reload() and, once a
 * SettingsStore is attached, across restarts.
 */
export class ConfigStore {
  private current: AppConfig;
  private version = 1;
  private overrides: Record<string, unknown> = {};
  private store: SettingsStore | null = null;

  constructor(private readonly source: ConfigSource = () => loadConfigSource()) {
    this.current = parseConfig(source());
  }

  static fromObject(raw: DeepPartial<AppConfig> = {}): ConfigStore {
    return new ConfigStore(() => _.cloneDeep(raw));
  }

  get(): AppConfig {
    return this.current;
  }

  getVersion(): number {
    return this.version;
  }

  getOverrides(): Record<string, unknown> {
    return _.cloneDeep(this.overrides);
  }

  replace(next: unknown): AppConfig {
    this.current = parseConfig(next);
    this.version++;
    return this.current;
  }

  /** Applies an admin override in memory. Use apply() to also persist it. */
  update(patch: ConfigPatch | Record<string, unknown>): AppConfig {
    const next = this.replace(_.merge(_.cloneDeep(this.current), patch));
    this.overrides = _.merge(_.cloneDeep(this.overrides), patch);
    return next;
  }

  async apply(patch: ConfigPatch | Record<string, unknown>): Promise<AppConfig> {
    const next = this.update(patch);
    if (this.store) await this.store.saveSettings(this.getOverrides());
    return next;
  }

  reload(): AppConfig {
    return this.replace(_.merge(_.cloneDeep(this.source()), this.overrides));
  }

  /** Loads the overrides saved in `store` and persists later apply() calls there. */
  async attach(store: SettingsStore): Promise<AppConfig> {
    this.store = store;
    const saved = await store.getSettings();
    if (_.isEmpty(saved)) return this.current;
    try {
      const next = parseConfig(_.merge(_.cloneDeep(this.source()), saved));
      this.overrides = _.cloneDeep(saved);
      this.current = next;
      this.version++;
      logger.info(`Config overrides restored: ${Object.keys(saved).join(", ")}`);
    } catch (err) {
      logger.error(`Saved config overrides ignored: ${util.errorMessage(err)}`);
    }
    return this.current;
  }
}
