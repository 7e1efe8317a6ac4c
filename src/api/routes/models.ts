import type { RouteModule } from "@/lib/server.ts";
import { listModels } from "@/api/controllers/models.ts";

export default (): RouteModule => ({

    prefix: '/v1',

    get: {
        '/models': async () => {
            return {
                object: 'list',
                data: listModels()
            };
        }

    }
})
