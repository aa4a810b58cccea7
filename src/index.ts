import { resolveAppConfig } from "./config/runtime";
import { errorMessage } from "./errors";
import { createLogger } from "./logger";
import { buildServer } from "./server";

async function main(): Promise<void> {
  const config = resolveAppConfig();
  const fastify = await buildServer({ config });

  const close = (signal: NodeJS.Signals) => {
    fastify.log.info({ signal }, "Shutting down");
    fastify.close().then(
      () => process.exit(0),
      (error: unknown) => {
        fastify.log.error({ err: error }, "Shutdown failed");
        process.exit(1);
      },
    );
  };
  process.once("SIGINT", close);
  process.once("SIGTERM", close);

  await fastify.listen({ host: config.server.host, port: config.server.port });
  fastify.log.info(
    { live: config.storage.dataFile, sample: config.storage.testDataFile },
    "Order tables ready",
  );
}

main().catch((error: unknown) => {
  createLogger("error").fatal({ err: error }, `Failed to start: ${errorMessage(error)}`);
  process.exit(1);
});
