import { z } from 'zod';

import type Request from "@/lib/request/Request.ts";
import type { RouteModule } from "@/lib/server.ts";
import type { Runtime } from "@/lib/runtime.ts";

const addProxySchema = z.object({
    proxyUrl: z.string().min(1),
    name: z.string().nullish()
});

const updateProxySchema = z.object({
    proxyUrl: z.string().min(1).optional(),
    name: z.string().nullable().optional(),
    enabled: z.boolean().optional()
});

const settingsSchema = z.object({
    enabled: z.boolean().optional(),
    url: z.string().min(1).nullable().optional(),
    poolEnabled: z.boolean().optional()
});

export default (runtime: Runtime): RouteModule => ({

    prefix: '/proxy',

    get: {

        '/pool': async () => {
            return { data: await runtime.proxies.list() };
        },

        '/config': async () => runtime.proxies.getSettings()

    },

    post: {

        '/pool': async (request: Request) => {
            const { proxyUrl, name } = request.parseBody(addProxySchema);
            return { success: true, data: await runtime.proxies.add(proxyUrl, name) };
        },

        '/pool/:id/toggle': async (request: Request) => {
            return { success: true, data: await runtime.proxies.toggle(request.intParam('id')) };
        },

        '/config': async (request: Request) => {
            const patch = request.parseBody(settingsSchema);
            return { success: true, data: await runtime.proxies.updateSettings(patch) };
        }

    },

    put: {

        '/pool/:id': async (request: Request) => {
            const patch = request.parseBody(updateProxySchema);
            return { success: true, data: await runtime.proxies.update(request.intParam('id'), patch) };
        }

    },

    delete: {

        '/pool/:id': async (request: Request) => {
            await runtime.proxies.remove(request.intParam('id'));
            return { success: true };
        }

    }

})
