import APIException from "@/lib/exceptions/APIException.ts";
import EX from "@/api/consts/exceptions.ts";
import type { ConfigPatch, ConfigStore } from "@/lib/config.ts";
import logger from "@/lib/logger.ts";
import util from "@/lib/util.ts";
import type { CredentialRegistry } from "@/lib/registry/registry.ts";
import type { ProxyPoolItem, ProxyPoolItemPatch } from "@/lib/registry/types.ts";

export interface ProxySelection {
  url: string;
  /** Pool entry id, null for the static single proxy. */
  id: number | null;
}

export interface ProxySettings {
  enabled: boolean;
  url: string | null;
  poolEnabled: boolean;
}

function assertProxyUrl(proxyUrl: string) {
  let parsed: URL;
  try {
    parsed = new URL(proxyUrl);
  } catch {
    throw new APIException(EX.API_REQUEST_PARAMS_INVALID, `Invalid proxy url: ${proxyUrl}`);
  }
  if (!["http:", "https:"].includes(parsed.protocol)) {
    throw new APIException(EX.API_REQUEST_PARAMS_INVALID, `Unsupported proxy protocol: ${parsed.protocol}`);
  }
}

export class ProxyRotator {
  private cursor = 0;

  constructor(
    private readonly registry: CredentialRegistry,
    private readonly config: ConfigStore,
    private readonly now: () => number = Date.now
  ) {}

  async next(): Promise<ProxySelection | null> {
    const settings = this.config.get().proxy;
    if (!settings.poolEnabled) {
      if (settings.enabled && settings.url) return { url: settings.url, id: null };
      return null;
    }
    const proxies = await this.registry.listEnabledProxies();
    if (proxies.length === 0) return null;
    // read-and-advance stays synchronous after the list arrives
    const index = this.cursor % proxies.length;
    this.cursor = (index + 1) % proxies.length;
    const proxy = proxies[index];
    return { url: proxy.proxyUrl, id: proxy.id };
  }

  async recordResult(id: number | null, success: boolean): Promise<void> {
    if (id === null) return;
    try {
      await this.registry.recordProxyUsage(id, success, this.now());
    } catch (err) {
      logger.warn(`Proxy ${id} usage record failed: ${util.errorMessage(err)}`);
    }
  }

  getSettings(): ProxySettings {
    const { enabled, url, poolEnabled } = this.config.get().proxy;
    return { enabled, url: url ?? null, poolEnabled };
  }

  /** A null url clears the single proxy. */
  async updateSettings(patch: Partial<ProxySettings>): Promise<ProxySettings> {
    if (patch.url) assertProxyUrl(patch.url);
    const proxy: NonNullable<ConfigPatch["proxy"]> = {};
    if (patch.enabled !== undefined) proxy.enabled = patch.enabled;
    if (patch.url !== undefined) proxy.url = patch.url;
    if (patch.poolEnabled !== undefined) proxy.poolEnabled = patch.poolEnabled;
    await this.config.apply({ proxy });
    logger.info(`Proxy settings updated: ${JSON.stringify(this.getSettings())}`);
    return this.getSettings();
  }

  async add(proxyUrl: string, name?: string | null): Promise<ProxyPoolItem> {
    assertProxyUrl(proxyUrl);
    const item = await this.registry.addProxy(proxyUrl, name ?? null);
    logger.info(`Proxy ${item.id} added to pool`);
    return item;
  }

  list(): Promise<ProxyPoolItem[]> {
    return this.registry.listProxies();
  }

  async update(id: number, patch: ProxyPoolItemPatch): Promise<ProxyPoolItem> {
    if (patch.proxyUrl) assertProxyUrl(patch.proxyUrl);
    const item = await this.registry.updateProxy(id, patch);
    if (!item) throw new APIException(EX.API_NOT_FOUND, `Proxy ${id} not found`);
    return item;
  }

  async remove(id: number): Promise<void> {
    if (!(await this.registry.deleteProxy(id))) throw new APIException(EX.API_NOT_FOUND, `Proxy ${id} not found`);
  }

  async toggle(id: number): Promise<ProxyPoolItem> {
    const current = (await this.registry.listProxies()).find((item) => item.id === id);
    if (!current) throw new APIException(EX.API_NOT_FOUND, `Proxy ${id} not found`);
    return this.update(id, { enabled: !current.enabled });
  }
}
