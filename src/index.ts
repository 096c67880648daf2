import { app } from "./app";
import { env } from "./config/env";

const server = app.listen(env.port, () => {
  console.log(`URL verdict server running on http://localhost:${env.port}`);
  console.log(`List files: ${env.whitelistFile}, ${env.blacklistFile}, ${env.dynamicBlacklistFile}`);
});

function shutdown(signal: string) {
  console.log(`Received ${signal}. Shutting down gracefully...`);
  server.close((err) => {
    if (err) {
      console.error("server close failed", err);
      process.exit(1);
    }
    process.exit(0);
  });
}

process.on("SIGINT", () => {
  shutdown("SIGINT");
});

process.on("SIGTERM", () => {
  shutdown("SIGTERM");
});
