import Fastify from "fastify";
import cors from "@fastify/cors";

import { readEnv } from "./config/env";
import { buildEngine } from "./engine/bootstrap";
import { buildLoggerOptions, createLogger } from "./logger";
import { healthRoutes } from "./routes/healthz";
import { missionRoutes } from "./routes/missions";
import { policyRoutes } from "./routes/policy";

async function main() {
  const env = readEnv();
  const app = Fastify({ logger: buildLoggerOptions(env.LOG_LEVEL) });
  const runtime = buildEngine(env, app.log);
  app.addHook("onClose", async () => runtime.close());

  // CORS: permissive for analyst tooling on other origins. Tighten before prod.
  app.register(cors, {
    origin: true,
  });

  // Routes
  app.register(healthRoutes, { policyVersion: () => runtime.engine.policyVersion });
  app.register(missionRoutes, { prefix: "/v1", engine: runtime.engine });
  app.register(policyRoutes, { prefix: "/v1", engine: runtime.engine });

  await app.listen({ port: env.PORT, host: env.HOST });
}

main().catch((err: unknown) => {
  createLogger().error({ err }, "server.start_failed");
  process.exit(1);
});
