import { createServer } from "./index";
import { getConfig } from "./lib/config";
import { closeDatabase } from "./lib/mysql";

const app = createServer();
const { PORT } = getConfig();

const server = app.listen(PORT, () => {
  // eslint-disable-next-line no-console
  console.log(`[server] listening on http://localhost:${PORT}`);
});

function shutdown(signal: string) {
  // eslint-disable-next-line no-console
  console.log(`[server] ${signal} received, shutting down`);
  server.close(() => {
    closeDatabase()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        // eslint-disable-next-line no-console
        console.error("[server] failed to close database", error);
        process.exit(1);
      });
  });
}

process.on("SIGTERM", () => shutdown("SIGTERM"));
process.on("SIGINT", () => shutdown("SIGINT"));
