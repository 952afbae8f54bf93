// api/src/server.ts
import { env } from "./env";
import { panelStore } from "./db";
import { createApp } from "./app";

const app = createApp({ store: panelStore, webOrigins: env.WEB_ORIGIN });

/** Trust proxy so client IPs and protocol are right behind a load balancer */
app.set("trust proxy", 1);

const server = app.listen(env.PORT, () => {
  console.log(`[server] panel configurator API listening on :${env.PORT}`);
});

function shutdown(signal: string) {
  console.log(`[server] ${signal} received, closing`);
  server.close(() => {
    panelStore
      .close()
      .then(() => process.exit(0))
      .catch((err) => {
        console.error("[server] failed to close database pool:", err);
        process.exit(1);
      });
  });
}

process.on("SIGTERM", () => shutdown("SIGTERM"));
process.on("SIGINT", () => shutdown("SIGINT"));
