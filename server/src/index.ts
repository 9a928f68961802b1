import { startEngineServer } from "./app.ts";
import { loadServerConfig } from "../../src/config.ts";

const { port, gamesDir } = loadServerConfig();

startEngineServer({ port, gamesDir })
  .then(({ url, gamesDir: dir }) => {
    // eslint-disable-next-line no-console
    console.log(`[engine-server] listening on ${url}`);
    // eslint-disable-next-line no-console
    console.log(`[engine-server] persistence dir: ${dir}`);
  })
  .catch((err) => {
    // eslint-disable-next-line no-console
    console.error("[engine-server] failed to start", err);
    process.exitCode = 1;
  });
