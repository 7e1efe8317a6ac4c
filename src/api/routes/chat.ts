import type Request from "@/lib/request/Request.ts";
import Response from "@/lib/response/Response.ts";
import type { RouteModule } from "@/lib/server.ts";
import type { Runtime } from "@/lib/runtime.ts";
import {
    chatRequestSchema,
    createCompletion,
    createCompletionStream,
    toGenerationRequest
} from "@/api/controllers/chat.ts";

export default (runtime: Runtime): RouteModule => ({

    prefix: '/v1/chat',

    post: {

        '/completions': async (request: Request) => {
            const body = request.parseBody(chatRequestSchema);
            const generation = await toGenerationRequest(body);
            if (body.stream) {
                const stream = createCompletionStream(runtime.orchestrator, generation);
                return new Response(stream, {
                    type: 'text/event-stream',
                    headers: {
                        'Cache-Control': 'no-cache',
                        'Connection': 'keep-alive',
                        'X-Accel-Buffering': 'no'
                    }
                });
            }
            return await createCompletion(runtime.orchestrator, generation);
        }

    }

})
