import _ from 'lodash';

import APIException from "@/lib/exceptions/APIException.ts";
import EX from "@/api/consts/exceptions.ts";
import type Request from "@/lib/request/Request.ts";
import type { RouteModule } from "@/lib/server.ts";
import type { Runtime } from "@/lib/runtime.ts";

export default (runtime: Runtime): RouteModule => ({

    prefix: '/tasks',

    get: {

        '/:taskId': async (request: Request) => {
            request.validate('params.taskId', _.isString);
            const task = await runtime.registry.getTask(request.params.taskId);
            if (!task) throw new APIException(EX.API_NOT_FOUND, `Task ${request.params.taskId} not found`);
            return task;
        }

    }

})
