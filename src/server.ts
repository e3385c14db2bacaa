import { config } from "./config.js";
import { startServer } from "./http/server.js";

const { server, port } = await startServer({ config });

function shutdown(): void {
  server.close(() => process.exit(0));
}

process.on("SIGINT", shutdown);
process.on("SIGTERM", shutdown);

console.log(`[Server] listening on :${port} (default language: ${config.language})`);
