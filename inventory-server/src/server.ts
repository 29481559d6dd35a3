// Server lifecycle: open the database, bind the listener, shut both down.
import type { Server } from "http";
import { createApp } from "./app.js";
import { openDatabase } from "./db.js";
import type { AppConfig, RunningServer } from "./types.js";

const boundPort = (server: Server, fallback: number) => {
  const address = server.address();
  return typeof address === "object" && address !== null ? address.port : fallback;
};

const closeServer = (server: Server) =>
  new Promise<void>((resolve, reject) => {
    if (!server.listening) {
      resolve();
      return;
    }
    server.close((err) => (err ? reject(err) : resolve()));
  });

export const startServer = async (config: AppConfig): Promise<RunningServer> => {
  const db = await openDatabase(config.databasePath);
  const app = createApp();

  return new Promise<RunningServer>((resolve, reject) => {
    const server = app.listen(config.port, config.host);

    const onStartupError = (err: Error) => {
      db.close();
      reject(err);
    };
    server.once("error", onStartupError);

    server.once("listening", () => {
      server.off("error", onStartupError);
      server.on("error", (err) => {
        console.error("Server error:", err);
      });

      const port = boundPort(server, config.port);
      let closing: Promise<void> | undefined;

      const close = () => {
        if (!closing) {
          closing = closeServer(server).finally(() => {
            if (db.open) {
              db.close();
            }
          });
        }
        return closing;
      };

      resolve({
        server,
        db,
        host: config.host,
        port,
        url: `http://${config.host}:${port}`,
        close
      });
    });
  });
};
