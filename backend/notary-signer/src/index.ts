import { NotarySigner } from "@attestkit/claim-sdk";
import { loadNotaryConfig } from "./config.js";
import { buildNotaryServer } from "./server.js";

async function bootstrap() {
  const config = loadNotaryConfig(process.env);
  const signer = new NotarySigner(config.privateKey);

  const fastify = await buildNotaryServer({
    signer,
    logger: { level: config.logLevel },
    corsOrigin: config.corsOrigin,
    rateLimitMax: config.rateLimitMax,
  });

  await fastify.listen({ port: config.port, host: config.host });
  fastify.log.info({ notary_address: signer.address }, "notary signer ready");
  console.log(`Notary signer listening on http://${config.host}:${config.port}`);
}

bootstrap().catch((e) => {
  console.error(e);
  process.exit(1);
});
