import Fastify from "fastify";
import cors from "@fastify/cors";
import websocket from "@fastify/websocket";
import type { LogLevel } from "../config/types.js";
import { registerRoutes, type RouteDeps } from "./routes.js";

export type ServerOptions = {
  logLevel: LogLevel | "silent";
};

export async function buildServer(deps: RouteDeps, options: ServerOptions) {
  const app = Fastify({ logger: { level: options.logLevel, name: "recording-lights" } });
  await app.register(cors, { origin: true });
  await app.register(websocket);

  const unsubscribe = deps.reconciler.subscribe((event) => deps.wsHub.broadcast(event));
  app.addHook("onClose", async () => {
    unsubscribe();
  });

  await registerRoutes(app, deps);
  return app;
}
