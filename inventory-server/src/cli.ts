// Command line handling: flags over env, startup reporting, signal shutdown.
import yargs from "yargs";
import { loadConfig } from "./config.js";
import { startServer } from "./server.js";
import type { Env, RunningServer } from "./types.js";

export type ExitFn = (code: number) => void;

const SHUTDOWN_SIGNALS: NodeJS.Signals[] = ["SIGINT", "SIGTERM"];

const parseArgs = (args: string[]) =>
  yargs(args)
    .scriptName("inventory-server")
    .option("host", {
      type: "string",
      describe: "Interface to bind (default 127.0.0.1)"
    })
    .option("port", {
      type: "number",
      describe: "Port to listen on (default 5000)"
    })
    .option("db", {
      type: "string",
      describe: "Path to the SQLite database file (default ./inventory.db)"
    })
    .strict()
    .parseSync();

// Closes the server on the first SIGINT/SIGTERM; the handlers go away with the server.
const handleSignals = (running: RunningServer, exit: ExitFn) => {
  const shutdown = (signal: NodeJS.Signals) => {
    console.log(`Received ${signal}, shutting down`);
    running.close().then(
      () => exit(0),
      (err: unknown) => {
        console.error("Error during shutdown:", err);
        exit(1);
      }
    );
  };

  for (const signal of SHUTDOWN_SIGNALS) {
    process.once(signal, shutdown);
  }
  running.server.once("close", () => {
    for (const signal of SHUTDOWN_SIGNALS) {
      process.off(signal, shutdown);
    }
  });
};

// Flags override HOST, PORT and DATABASE_PATH from env.
export const run = async (
  args: string[],
  env: Env,
  exit: ExitFn = (code) => process.exit(code)
): Promise<RunningServer | undefined> => {
  const argv = parseArgs(args);
  try {
    const config = loadConfig(env, {
      host: argv.host,
      port: argv.port,
      databasePath: argv.db
    });
    const running = await startServer(config);
    console.log(`Database ready at ${config.databasePath}`);
    console.log(`Inventory system running on ${running.url}`);
    handleSignals(running, exit);
    return running;
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.error(`Failed to start server: ${message}`);
    exit(1);
    return undefined;
  }
};
