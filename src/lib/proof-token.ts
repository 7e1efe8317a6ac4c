import axios from "axios";
import { z } from "zod";

import type { ConfigStore } from "@/lib/config.ts";
import logger from "@/lib/logger.ts";
import util from "@/lib/util.ts";

/** Supplies the anti-abuse proof token submissions carry. Never throws. */
export interface ProofTokenProvider {
  getProofToken(projectId: string): Promise<string | null>;
}

export class NoopProofTokenProvider implements ProofTokenProvider {
  async getProofToken(): Promise<string | null> {
    return null;
  }
}

const createTaskSchema = z.object({
  errorId: z.number().optional(),
  errorDescription: z.string().optional(),
  taskId: z.union([z.string(), z.number()]).optional(),
});

const taskResultSchema = z.object({
  status: z.string().optional(),
  errorId: z.number().optional(),
  solution: z.object({ gRecaptchaResponse: z.string().optional() }).partial().nullish(),
});

/** Delegates solving to a createTask / getTaskResult style solver service. */
export class RemoteSolverProofTokenProvider implements ProofTokenProvider {
  constructor(
    private readonly config: ConfigStore,
    private readonly sleep: (ms: number) => Promise<void> = util.sleep
  ) {}

  async getProofToken(projectId: string): Promise<string | null> {
    const { apiKey, baseUrl, websiteKey, pageAction, pollAttempts, pollIntervalMs } = this.config.get().captcha;
    if (!apiKey || !websiteKey) {
      logger.debug("Proof token solver not configured, skipping");
      return null;
    }
    try {
      const created = createTaskSchema.parse(
        (
          await axios.post(`${baseUrl}/createTask`, {
            clientKey: apiKey,
            task: {
              websiteURL: `https://labs.google/fx/tools/flow/project/${projectId}`,
              websiteKey,
              type: "RecaptchaV3TaskProxylessM1",
              pageAction,
            },
          })
        ).data
      );
      if (created.taskId === undefined) {
        logger.warn(`Proof token task not created: ${created.errorDescription ?? "no task id"}`);
        return null;
      }
      for (let attempt = 1; attempt <= pollAttempts; attempt++) {
        const result = taskResultSchema.parse(
          (await axios.post(`${baseUrl}/getTaskResult`, { clientKey: apiKey, taskId: created.taskId })).data
        );
        const solved = result.solution?.gRecaptchaResponse;
        if (solved) return solved;
        if (result.errorId) {
          logger.warn(`Proof token task ${created.taskId} failed with errorId ${result.errorId}`);
          return null;
        }
        await this.sleep(pollIntervalMs);
      }
      logger.warn(`Proof token task ${created.taskId} not solved after ${pollAttempts} polls`);
      return null;
    } catch (err) {
      logger.warn(`Proof token request failed: ${util.errorMessage(err)}`);
      return null;
    }
  }
}

/** Follows `captcha.method` on every call, so a config update takes effect immediately. */
export class ConfiguredProofTokenProvider implements ProofTokenProvider {
  private readonly remote: ProofTokenProvider;
  private readonly noop = new NoopProofTokenProvider();

  constructor(private readonly config: ConfigStore) {
    this.remote = new RemoteSolverProofTokenProvider(config);
  }

  getProofToken(projectId: string): Promise<string | null> {
    const provider = this.config.get().captcha.method === "remote" ? this.remote : this.noop;
    return provider.getProofToken(projectId);
  }
}
