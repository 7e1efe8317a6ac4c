import _ from 'lodash';
import { z } from 'zod';

import type Request from "@/lib/request/Request.ts";
import type { RouteModule } from "@/lib/server.ts";
import type { Runtime } from "@/lib/runtime.ts";
import type { Token } from "@/lib/registry/types.ts";
import util from "@/lib/util.ts";

const concurrency = z.number().int().min(-1);

const addTokenSchema = z.object({
    sessionCredential: z.string().min(1),
    name: z.string().optional(),
    remark: z.string().nullish(),
    projectId: z.string().nullish(),
    projectName: z.string().nullish(),
    imageEnabled: z.boolean().optional(),
    videoEnabled: z.boolean().optional(),
    imageConcurrency: concurrency.optional(),
    videoConcurrency: concurrency.optional()
});

const updateTokenSchema = z.object({
    sessionCredential: z.string().min(1).optional(),
    name: z.string().optional(),
    remark: z.string().nullable().optional(),
    imageEnabled: z.boolean().optional(),
    videoEnabled: z.boolean().optional(),
    imageConcurrency: concurrency.optional(),
    videoConcurrency: concurrency.optional(),
    currentProjectId: z.string().nullable().optional(),
    currentProjectName: z.string().nullable().optional()
});

/** Credentials are never echoed back in full. */
export function maskToken<T extends Token>(token: T): T {
    return {
        ...token,
        sessionCredential: util.maskSecret(token.sessionCredential),
        accessCredential: token.accessCredential ? util.maskSecret(token.accessCredential) : null
    };
}

function queryNumber(value: unknown): number | undefined {
    if (!_.isString(value) || value.length === 0) return undefined;
    const parsed = Number(value);
    return Number.isInteger(parsed) ? parsed : undefined;
}

export default (runtime: Runtime): RouteModule => ({

    prefix: '/token',

    get: {

        '': async () => {
            const tokens = await runtime.tokens.listTokens();
            return {
                total: tokens.length,
                active: tokens.filter(token => token.isActive).length,
                data: tokens.map(maskToken)
            };
        },

        '/concurrency': async () => {
            return { data: runtime.concurrency.snapshot() };
        },

        '/logs': async (request: Request) => {
            const limit = queryNumber(request.query.limit) ?? 100;
            const tokenId = queryNumber(request.query.tokenId);
            return { data: await runtime.registry.listRequestLogs(limit, tokenId) };
        }

    },

    post: {

        '': async (request: Request) => {
            const body = request.parseBody(addTokenSchema);
            const token = await runtime.tokens.addToken({
                ...body,
                remark: body.remark ?? null,
                projectId: body.projectId ?? null,
                projectName: body.projectName ?? null
            });
            return { success: true, data: maskToken(token) };
        },

        '/:id/enable': async (request: Request) => {
            const token = await runtime.tokens.enable(request.intParam('id'));
            return { success: true, data: maskToken(token) };
        },

        '/:id/disable': async (request: Request) => {
            const token = await runtime.tokens.disable(request.intParam('id'));
            return { success: true, data: maskToken(token) };
        },

        '/:id/refresh-at': async (request: Request) => {
            const token = await runtime.tokens.refreshAccess(request.intParam('id'));
            return {
                success: true,
                data: { id: token.id, accessExpiresAt: token.accessExpiresAt }
            };
        },

        '/:id/refresh-credits': async (request: Request) => {
            const tokenId = request.intParam('id');
            const credits = await runtime.tokens.refreshCredits(tokenId);
            return { success: true, data: { id: tokenId, credits } };
        }

    },

    put: {

        '/:id': async (request: Request) => {
            const body = request.parseBody(updateTokenSchema);
            const token = await runtime.tokens.updateToken(request.intParam('id'), body);
            return { success: true, data: maskToken(token) };
        }

    },

    delete: {

        '/:id': async (request: Request) => {
            const deleteProjects = request.query.deleteProjects === 'true';
            await runtime.tokens.deleteToken(request.intParam('id'), { deleteProjects });
            return { success: true };
        }

    }

})
