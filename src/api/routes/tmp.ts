import path from 'path';

import fs from 'fs-extra';

import APIException from "@/lib/exceptions/APIException.ts";
import EX from "@/api/consts/exceptions.ts";
import type Request from "@/lib/request/Request.ts";
import Response from "@/lib/response/Response.ts";
import type { RouteModule } from "@/lib/server.ts";
import type { Runtime } from "@/lib/runtime.ts";

const CONTENT_TYPES: Record<string, string> = {
    '.jpg': 'image/jpeg',
    '.mp4': 'video/mp4'
};

export default (runtime: Runtime): RouteModule => ({

    prefix: '/tmp',

    get: {

        '/:filename': async (request: Request) => {
            const filePath = runtime.cache.resolvePath(request.params.filename ?? '');
            if (!filePath || !(await fs.pathExists(filePath)))
                throw new APIException(EX.API_NOT_FOUND, `File ${request.params.filename} not found`).setHTTPStatusCode(404);
            const stat = await fs.stat(filePath);
            return new Response(fs.createReadStream(filePath), {
                type: CONTENT_TYPES[path.extname(filePath)] ?? 'application/octet-stream',
                headers: {
                    'Content-Length': stat.size,
                    'Cache-Control': 'public, max-age=3600'
                }
            });
        }

    }

})
