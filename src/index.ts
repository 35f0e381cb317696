import { buildServer } from "./api/server.js";
import { loadRuntimeConfig } from "./config/load-config.js";
import { createControlSource } from "./control/create-control-source.js";
import { Reconciler } from "./core/reconciler.js";
import { asErrorMessage } from "./core/errors.js";
import { createDeviceStack } from "./device-stack.js";
import { createLogger } from "./logger.js";
import { WsHub } from "./ws/hub.js";

async function main(): Promise<void> {
  const config = await loadRuntimeConfig();
  const logger = createLogger(config.logging);
  const { transport, registry, actuator } = createDeviceStack(config, logger);

  const reconciler = new Reconciler(actuator, {
    debounceMs: config.control.debounceMs,
    queueCapacity: config.control.queueCapacity,
    syncOnStart: config.actuation.syncOnStart,
    logger: logger.child({ component: "reconciler" }),
  });
  const source = createControlSource(config.control, logger);

  logger.info(
    { devices: config.devices.length, transport: transport.id, source: source.id, debounceMs: config.control.debounceMs },
    "Starting recording lights controller",
  );

  await registry.warm();
  reconciler.start();
  await source.start((event) => {
    reconciler.submit(event);
  });

  const app = config.server.enabled
    ? await buildServer(
        { reconciler, actuator, registry, wsHub: new WsHub(logger.child({ component: "ws" })) },
        { logLevel: config.logging.level },
      )
    : null;
  if (app) {
    await app.listen({ port: config.server.port, host: config.server.host });
  }

  let stopping = false;
  const shutdown = async (signal: NodeJS.Signals): Promise<void> => {
    if (stopping) return;
    stopping = true;
    logger.info({ signal }, "Shutting down");
    await source.stop();
    await app?.close();
    await reconciler.stop();
    await transport.close();
  };

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      shutdown(signal).then(
        () => process.exit(0),
        (error: unknown) => {
          logger.error({ error: asErrorMessage(error) }, "Shutdown failed");
          process.exit(1);
        },
      );
    });
  }
}

main().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
