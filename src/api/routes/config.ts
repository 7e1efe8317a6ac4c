import _ from 'lodash';
import { z, ZodError } from 'zod';

import APIException from "@/lib/exceptions/APIException.ts";
import EX from "@/api/consts/exceptions.ts";
import type { AppConfig } from "@/lib/config.ts";
import logger from "@/lib/logger.ts";
import type Request from "@/lib/request/Request.ts";
import type { RouteModule } from "@/lib/server.ts";
import type { Runtime } from "@/lib/runtime.ts";
import util from "@/lib/util.ts";

const patchSchema = z.record(z.unknown());

const cacheTimeoutSchema = z.object({
    timeoutSeconds: z.number().int().positive()
});

const SECRET_PATHS = ['service.apiKey', 'captcha.apiKey'];

/** The config as shown to admins, secrets masked. */
export function publicConfig(config: AppConfig) {
    const masked = _.cloneDeep(config);
    if (masked.service.apiKey) masked.service.apiKey = util.maskSecret(masked.service.apiKey);
    if (masked.captcha.apiKey) masked.captcha.apiKey = util.maskSecret(masked.captcha.apiKey);
    return masked;
}

/** Drops secrets sent back in their masked form so they keep the stored value. */
export function withoutMaskedSecrets(patch: Record<string, unknown>, current: AppConfig): Record<string, unknown> {
    const cleaned = _.cloneDeep(patch);
    for (const secretPath of SECRET_PATHS) {
        const stored = _.get(current, secretPath);
        if (_.isString(stored) && _.get(cleaned, secretPath) === util.maskSecret(stored)) _.unset(cleaned, secretPath);
    }
    return cleaned;
}

async function apply(runtime: Runtime, next: () => AppConfig | Promise<AppConfig>): Promise<AppConfig> {
    let config: AppConfig;
    try {
        config = await next();
    } catch (err) {
        if (err instanceof ZodError) {
            const issue = err.issues[0];
            throw new APIException(EX.API_REQUEST_PARAMS_INVALID, `Invalid config ${issue?.path.join('.') ?? ''}: ${issue?.message ?? err.message}`);
        }
        throw err;
    }
    logger.setLevel(config.log.level);
    logger.info(`Config updated to version ${runtime.config.getVersion()}`);
    return config;
}

export default (runtime: Runtime): RouteModule => ({

    prefix: '/config',

    get: {

        '': async () => {
            return {
                version: runtime.config.getVersion(),
                data: publicConfig(runtime.config.get())
            };
        }

    },

    post: {

        '': async (request: Request) => {
            const patch = withoutMaskedSecrets(request.parseBody(patchSchema), runtime.config.get());
            const config = await apply(runtime, () => runtime.config.apply(patch));
            return { success: true, version: runtime.config.getVersion(), data: publicConfig(config) };
        },

        '/reload': async () => {
            const config = await apply(runtime, () => runtime.config.reload());
            return { success: true, version: runtime.config.getVersion(), data: publicConfig(config) };
        },

        '/cache/timeout': async (request: Request) => {
            const { timeoutSeconds } = request.parseBody(cacheTimeoutSchema);
            await runtime.cache.setTimeout(timeoutSeconds);
            return { success: true, timeoutSeconds: runtime.cache.getTimeout() };
        },

        '/cache/clear': async () => {
            return { success: true, removed: await runtime.cache.clearAll() };
        }

    }

})
