import { startServer } from "./http/server.js";

const port = Number(process.env.PORT ?? 3000);
const metricsEnabled = process.env.METRICS_ENABLED === "1";

const { server, port: boundPort } = await startServer({ port, metricsEnabled });

function shutdown(signal: NodeJS.Signals): void {
  console.log(`${signal} received, closing`);
  server.close(() => process.exit(0));
}

process.on("SIGINT", shutdown);
process.on("SIGTERM", shutdown);

console.log(`trie lexicon listening on :${boundPort}${metricsEnabled ? " (metrics enabled)" : ""}`);
