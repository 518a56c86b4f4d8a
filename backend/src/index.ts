import dotenv from "dotenv";
import { createApp } from "./app";
import { loadConfig } from "./config";
import { createServiceContext } from "./services/context";

dotenv.config();

async function main() {
  const config = loadConfig();
  const ctx = await createServiceContext(config);
  const app = createApp(ctx);

  const server = app.listen(config.port, () => {
    console.log(`Server listening on http://localhost:${config.port}`);
  });

  const shutdown = () => {
    console.log("Shutting down...");
    server.close(() => {
      ctx.close().then(
        () => process.exit(0),
        (err) => {
          console.error("Failed to close backends:", err);
          process.exit(1);
        }
      );
    });
  };
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

main().catch((err) => {
  console.error("Failed to start server:", err);
  process.exit(1);
});
