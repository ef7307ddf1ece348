import { createServer } from "http";
import next from "next";
import { ConfigError, loadTrackerConfig } from "../lib/config";

async function main() {
  let port: number;
  try {
    port = loadTrackerConfig().server.port;
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(`[config] ${err.message}`);
      process.exit(1);
    }
    throw err;
  }

  const dev = process.env.NODE_ENV !== "production";
  const app = next({ dev, port });
  const handle = app.getRequestHandler();
  await app.prepare();

  createServer((req, res) => {
    handle(req, res).catch((err: unknown) => {
      console.error("[serve] Request failed:", err instanceof Error ? err.message : err);
      res.statusCode = 500;
      res.end("Internal Server Error");
    });
  }).listen(port, () => {
    console.log(`[serve] Dashboard running on http://localhost:${port}`);
  });
}

main().catch((err) => {
  console.error("Fatal error:", err);
  process.exit(1);
});
