import type { Server } from "http";
import type { InventoryDatabase } from "./db.js";

export type AppConfig = {
  host: string;
  port: number;
  databasePath: string;
};

export type ConfigOverrides = Partial<AppConfig>;

export type Env = Record<string, string | undefined>;

export type RunningServer = {
  server: Server;
  db: InventoryDatabase;
  host: string;
  port: number;
  url: string;
  close: () => Promise<void>;
};
