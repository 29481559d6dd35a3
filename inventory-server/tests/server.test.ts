import fs from "fs";
import os from "os";
import path from "path";
import { afterEach, describe, expect, it, vi } from "vitest";
import { startServer } from "../src/server.js";
import type { RunningServer } from "../src/types.js";

describe("startServer", () => {
  const started: RunningServer[] = [];
  const tempDirs: string[] = [];

  afterEach(async () => {
    await Promise.all(started.splice(0).map((running) => running.close()));
    for (const dir of tempDirs.splice(0)) {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  it("binds an available port and reports it", async () => {
    const running = await startServer({ host: "127.0.0.1", port: 0, databasePath: ":memory:" });
    started.push(running);

    expect(running.server.listening).toBe(true);
    expect(running.port).toBeGreaterThan(0);
    expect(running.url).toBe(`http://127.0.0.1:${running.port}`);
  });

  it("creates the database file on first run", async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "inventory-server-"));
    tempDirs.push(dir);
    const databasePath = path.join(dir, "inventory.db");

    const running = await startServer({ host: "127.0.0.1", port: 0, databasePath });
    started.push(running);

    expect(fs.existsSync(databasePath)).toBe(true);
    expect(running.db.path).toBe(databasePath);
  });

  it("rejects when the port is already taken", async () => {
    const first = await startServer({ host: "127.0.0.1", port: 0, databasePath: ":memory:" });
    started.push(first);

    await expect(
      startServer({ host: "127.0.0.1", port: first.port, databasePath: ":memory:" })
    ).rejects.toMatchObject({ code: "EADDRINUSE" });
  });

  it("closes the listener and the database, and tolerates a second close", async () => {
    const running = await startServer({ host: "127.0.0.1", port: 0, databasePath: ":memory:" });

    await running.close();
    await running.close();

    expect(running.server.listening).toBe(false);
    expect(running.db.open).toBe(false);
  });

  it("logs errors raised after startup and keeps serving", async () => {
    const running = await startServer({ host: "127.0.0.1", port: 0, databasePath: ":memory:" });
    started.push(running);
    const consoleError = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const failure = new Error("socket reset");

    running.server.emit("error", failure);

    expect(consoleError).toHaveBeenCalledWith("Server error:", failure);
    expect(running.db.open).toBe(true);
    expect(running.server.listening).toBe(true);
    consoleError.mockRestore();
  });
});
