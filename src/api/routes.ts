import type { FastifyInstance } from "fastify";
import type { z } from "zod";
import type { Actuator } from "../core/actuator.js";
import { controlEvent } from "../core/control-event.js";
import type { Reconciler } from "../core/reconciler.js";
import type { DeviceRegistry } from "../devices/device-registry.js";
import type { WsHub } from "../ws/hub.js";
import { controlPayloadSchema, overridePayloadSchema, type ClientEvent } from "../ws/protocol.js";

export type RouteDeps = {
  reconciler: Reconciler;
  actuator: Actuator;
  registry: DeviceRegistry;
  wsHub: WsHub;
};

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(body)"}: ${issue.message}`)
    .join("; ");
}

export async function registerRoutes(app: FastifyInstance, deps: RouteDeps): Promise<void> {
  const { reconciler, actuator, registry, wsHub } = deps;

  const handleClientEvent = (event: ClientEvent): void => {
    switch (event.type) {
      case "override":
        void reconciler.override(event.payload.on);
        break;
      case "control":
        reconciler.submit(controlEvent(event.payload.signal, event.payload.value));
        break;
    }
  };

  app.get("/health", async () => ({ ok: true }));

  app.get("/api/state", async () => reconciler.getStatus());

  app.get("/api/devices", async () => {
    const latest = new Map(actuator.lastResults().map((result) => [result.deviceId, result]));
    return registry.all().map((entry) => ({
      ...entry,
      resolved: registry.isResolved(entry.deviceId),
      lastResult: latest.get(entry.deviceId) ?? null,
    }));
  });

  app.post("/api/lights", async (request, reply) => {
    const parsed = overridePayloadSchema.safeParse(request.body);
    if (!parsed.success) {
      reply.code(400);
      return { error: formatIssues(parsed.error) };
    }
    const results = await reconciler.override(parsed.data.on);
    return { on: parsed.data.on, results };
  });

  app.post("/api/control", async (request, reply) => {
    const parsed = controlPayloadSchema.safeParse(request.body);
    if (!parsed.success) {
      reply.code(400);
      return { error: formatIssues(parsed.error) };
    }
    const accepted = reconciler.submit(controlEvent(parsed.data.signal, parsed.data.value));
    reply.code(accepted ? 202 : 503);
    return { accepted };
  });

  app.get("/ws", { websocket: true }, (socket) => {
    wsHub.addClient(socket, handleClientEvent);
    wsHub.send(socket, { type: "status", payload: reconciler.getStatus() });
  });
}
