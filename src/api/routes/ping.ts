import type { RouteModule } from "@/lib/server.ts";

export default (): RouteModule => ({

    get: {
        '/ping': async () => 'pong'
    }

})
