import type { RouteModule } from "@/lib/server.ts";
import type { Runtime } from "@/lib/runtime.ts";
import chat from "./chat.ts";
import config from "./config.ts";
import models from "./models.ts";
import ping from "./ping.ts";
import proxy from "./proxy.ts";
import tasks from "./tasks.ts";
import tmp from "./tmp.ts";
import token from "./token.ts";

export default (runtime: Runtime): RouteModule[] => [
    ping(),
    models(),
    chat(runtime),
    token(runtime),
    proxy(runtime),
    config(runtime),
    tasks(runtime),
    tmp(runtime)
];
