// SQLite file that backs the inventory data, held in memory by sql.js and written back to disk.
import fs from "fs";
import path from "path";
import initSqlJs from "sql.js";
import { MEMORY_DATABASE } from "./config.js";

type SqlJsStatic = Awaited<ReturnType<typeof initSqlJs>>;
export type SqlDatabase = InstanceType<SqlJsStatic["Database"]>;

let sqlJs: Promise<SqlJsStatic> | undefined;

// The wasm module is loaded once per process.
const loadSqlJs = () => {
  if (!sqlJs) {
    sqlJs = initSqlJs();
  }
  return sqlJs;
};

// export() reopens the connection, so connection pragmas are applied again after each save.
const applyPragmas = (sql: SqlDatabase) => {
  sql.run("PRAGMA foreign_keys = ON");
};

export class InventoryDatabase {
  private closed = false;

  constructor(
    readonly path: string,
    readonly sql: SqlDatabase
  ) {}

  get memory() {
    return this.path === MEMORY_DATABASE;
  }

  get open() {
    return !this.closed;
  }

  save(): void {
    if (this.memory || this.closed) {
      return;
    }
    fs.writeFileSync(this.path, this.sql.export());
    applyPragmas(this.sql);
  }

  close(): void {
    if (this.closed) {
      return;
    }
    this.save();
    this.sql.close();
    this.closed = true;
  }
}

// The file (and its directory) is created on first run and loaded on later runs.
export const openDatabase = async (databasePath: string): Promise<InventoryDatabase> => {
  const SQL = await loadSqlJs();

  if (databasePath === MEMORY_DATABASE) {
    const sql = new SQL.Database();
    applyPragmas(sql);
    return new InventoryDatabase(databasePath, sql);
  }

  fs.mkdirSync(path.dirname(databasePath), { recursive: true });
  const existing = fs.existsSync(databasePath) ? fs.readFileSync(databasePath) : undefined;
  const sql = new SQL.Database(existing);
  applyPragmas(sql);

  const db = new InventoryDatabase(databasePath, sql);
  db.save();
  return db;
};
