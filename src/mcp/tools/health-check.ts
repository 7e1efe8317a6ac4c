import { normalizeToolError } from "../errors.ts";
import { summarizePool, type PoolSummary } from "../pool.ts";
import { healthCheckInputSchema } from "../schemas.ts";
import type { ToolDeps } from "../types.ts";
import { registerSafeTool } from "../tool-factory.ts";

interface HealthReport {
  ok: boolean;
  latencyMs: number;
  pool: PoolSummary | null;
  poolError: string | null;
}

function describeHealth(report: HealthReport): string {
  if (!report.ok) return "Gateway did not answer ping";
  if (!report.pool) return `Gateway up (${report.latencyMs}ms), pool unavailable: ${report.poolError ?? "unknown"}`;
  const { active, total, imageReady, videoReady } = report.pool;
  return `Gateway up (${report.latencyMs}ms): ${active}/${total} tokens active, ${imageReady} image-ready, ${videoReady} video-ready`;
}

export function registerHealthCheckTool({ server, client }: ToolDeps): void {
  registerSafeTool(
    server,
    "health_check",
    {
      title: "Health Check",
      description: "Ping the gateway and summarise its token pool",
      inputSchema: healthCheckInputSchema,
      annotations: { readOnlyHint: true },
      summarize: describeHealth,
    },
    async (): Promise<HealthReport> => {
      const startedAt = Date.now();
      const ok = (await client.healthCheck()) === "pong";
      const latencyMs = Date.now() - startedAt;
      try {
        return { ok, latencyMs, pool: summarizePool(await client.listTokens()), poolError: null };
      } catch (error) {
        const normalized = normalizeToolError(error);
        return { ok, latencyMs, pool: null, poolError: `[${normalized.code}] ${normalized.message}` };
      }
    }
  );
}
