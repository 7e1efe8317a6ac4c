import type { MediaUpstream } from "@/api/controllers/flow.ts";
import { FlowClient } from "@/api/controllers/flow.ts";
import { UpstreamRequester } from "@/api/controllers/core.ts";
import { GenerationOrchestrator } from "@/api/controllers/generation.ts";
import { ConcurrencyController } from "@/lib/concurrency.ts";
import { ConfigStore } from "@/lib/config.ts";
import type { Downloader } from "@/lib/downloaders.ts";
import { FileCache } from "@/lib/file-cache.ts";
import { TokenSelector } from "@/lib/load-balancer.ts";
import logger from "@/lib/logger.ts";
import { ConfiguredProofTokenProvider, type ProofTokenProvider } from "@/lib/proof-token.ts";
import { ProxyRotator } from "@/lib/proxy-rotator.ts";
import { FileRegistry } from "@/lib/registry/file-registry.ts";
import type { CredentialRegistry } from "@/lib/registry/registry.ts";
import { TokenManager, type SessionRenewer } from "@/lib/token-manager.ts";

export interface RuntimeOptions {
  config?: ConfigStore;
  /** Defaults to a FileRegistry at `registry.file`. */
  registry?: CredentialRegistry;
  /** Defaults to the HTTP client of the generation API. */
  upstream?: MediaUpstream;
  proofTokens?: ProofTokenProvider;
  downloaders?: Downloader[];
  renewer?: SessionRenewer | null;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

/** The long-lived services one gateway process shares between requests. */
export class Runtime {
  readonly config: ConfigStore;
  readonly registry: CredentialRegistry;
  readonly proxies: ProxyRotator;
  readonly upstream: MediaUpstream;
  readonly tokens: TokenManager;
  readonly concurrency: ConcurrencyController;
  readonly selector: TokenSelector;
  readonly cache: FileCache;
  readonly orchestrator: GenerationOrchestrator;

  constructor(options: RuntimeOptions = {}) {
    const now = options.now ?? Date.now;
    this.config = options.config ?? new ConfigStore();
    this.registry = options.registry ?? new FileRegistry(this.config.get().registry.file);
    this.proxies = new ProxyRotator(this.registry, this.config, now);
    this.upstream =
      options.upstream ??
      new FlowClient(
        new UpstreamRequester(this.config, this.proxies),
        this.config,
        options.proofTokens ?? new ConfiguredProofTokenProvider(this.config)
      );
    this.tokens = new TokenManager({
      registry: this.registry,
      upstream: this.upstream,
      config: this.config,
      renewer: options.renewer,
      now,
    });
    this.concurrency = new ConcurrencyController();
    this.selector = new TokenSelector(this.tokens, this.concurrency);
    this.cache = new FileCache({ config: this.config, downloaders: options.downloaders, now, sleep: options.sleep });
    this.orchestrator = new GenerationOrchestrator({
      config: this.config,
      registry: this.registry,
      tokens: this.tokens,
      selector: this.selector,
      concurrency: this.concurrency,
      upstream: this.upstream,
      cache: this.cache,
      sleep: options.sleep,
      now,
    });
  }

  /** Loads persisted state and starts background work. */
  async start() {
    if (this.registry instanceof FileRegistry) {
      await this.registry.load();
      logger.info(`Registry loaded from ${this.registry.getFilePath()}`);
    }
    await this.config.attach(this.registry);
    const { log } = this.config.get();
    logger.setLevel(log.level);
    if (log.fileOutput) logger.enableFileOutput(log.dir);
    this.cache.startCleanupTask();
  }

  async stop() {
    this.cache.stopCleanupTask();
    if (this.registry instanceof FileRegistry) await this.registry.flush();
  }
}
