/**
 * Server entry — reads the environment and listens.
 * No business logic.
 */

import { createApp } from "./app.js";
import { loadConfig } from "./deps.js";

const config = loadConfig();
const { server } = createApp({ culture: config.culture });

server.listen(config.port, () => {
  console.info(
    `Duration service listening on http://localhost:${config.port} (culture: ${config.locale ?? "invariant"})`
  );
});
