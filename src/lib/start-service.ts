import { performance } from "perf_hooks";

import environment from "@/lib/environment.ts";
import logger from "@/lib/logger.ts";
import { Runtime, type RuntimeOptions } from "@/lib/runtime.ts";
import { Server } from "@/lib/server.ts";
import util from "@/lib/util.ts";
import routes from "@/api/routes/index.ts";

export interface RunningService {
  runtime: Runtime;
  server: Server;
  stop(): Promise<void>;
}

export async function startService(options: RuntimeOptions = {}): Promise<RunningService> {
  const startupTime = performance.now();
  const runtime = new Runtime(options);
  const { service } = runtime.config.get();

  logger.header();
  logger.info("<<<< flow-gateway >>>>");
  logger.info("Version:", environment.package.version);
  logger.info("Process id:", process.pid);
  logger.info("Environment:", environment.env);
  logger.info("Service name:", service.name);

  await runtime.start();
  const server = new Server(runtime.config);
  server.attachRoutes(routes(runtime));
  await server.listen();

  if (service.apiKey) logger.info("API key required:", util.maskSecret(service.apiKey));
  if (service.baseUrl) logger.success("Public base url:", service.baseUrl);

  logger.success(`Service startup completed (${Math.floor(performance.now() - startupTime)}ms)`);

  const stop = async () => {
    await server.close();
    await runtime.stop();
    logger.footer();
  };
  return { runtime, server, stop };
}
