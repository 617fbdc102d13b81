import { loadAgentEnv } from "../config/env.js";
import { createAutoAnswerService } from "../services/autoAnswer.js";
import { asErrorMessage } from "../utils/async.js";
import { createApp } from "./app.js";

async function main() {
  const env = loadAgentEnv();
  const service = createAutoAnswerService(env);
  await service.init();

  const app = createApp(service);
  const server = app.listen(env.PORT, () => {
    console.log(`Phone assist API running at http://localhost:${env.PORT}`);
  });

  const shutdown = () => {
    void service
      .stop()
      .catch((error: unknown) => console.error(`[web] stop failed: ${asErrorMessage(error)}`))
      .finally(() => server.close());
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
}

main().catch((error: unknown) => {
  console.error(asErrorMessage(error));
  process.exit(1);
});
