/**
 * Express server entrypoint.
 */

import { getPort } from "../src/lib/config.js";
import { makeEvaluationRuntime } from "../src/lib/evaluation/index.js";
import { createApp } from "./app.js";

async function start() {
  const runtime = makeEvaluationRuntime();
  const app = createApp(runtime);
  const port = getPort();
  app.listen(port, "0.0.0.0", () => {
    console.log(`Server running at http://0.0.0.0:${port}`);
  });
}
start().catch((e) => {
  console.error("Server failed to start:", e);
  process.exit(1);
});
