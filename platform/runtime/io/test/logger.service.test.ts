import fs from "fs";
import os from "os";
import path from "path";
import { describe, expect, it, vi } from "vitest";
import { LoggerService } from "../src/logger.service";

describe("LoggerService", () => {
  it("notifies listeners when logs are written", () => {
    const service = new LoggerService();
    service.configure({ level: "silent" });
    const listener = vi.fn();
    const unregister = service.registerListener(listener);

    const logger = service.getLogger("test");
    logger.info({ plugin: "load" }, "hello");

    expect(listener).toHaveBeenCalledWith({
      level: "info",
      args: [{ plugin: "load" }, "hello"],
    });

    unregister();
  });

  it("notifies listeners for loggers created with withBindings", () => {
    const service = new LoggerService();
    service.configure({ level: "silent" });
    const listener = vi.fn();
    const unregister = service.registerListener(listener);

    const logger = service.withBindings({ phase: "init" });
    logger.debug("bound log");

    expect(listener).toHaveBeenCalledWith({
      level: "debug",
      args: ["bound log"],
    });

    unregister();
  });

  it("stops notifying once a listener is unregistered", () => {
    const service = new LoggerService();
    service.configure({ level: "silent" });
    const listener = vi.fn();
    const unregister = service.registerListener(listener);

    unregister();
    service.getLogger().warn("ignored");

    expect(listener).not.toHaveBeenCalled();
  });

  it("reuses the root logger while the configuration is unchanged", () => {
    const service = new LoggerService();

    const first = service.configure({ level: "silent" });
    const second = service.configure({ level: "silent" });
    const third = service.configure({ level: "error" });

    expect(second).toBe(first);
    expect(third).not.toBe(first);
    expect(third.level).toBe("error");
  });

  it("builds the root logger from injected defaults", () => {
    const service = new LoggerService({ level: "silent" });

    expect(service.getLogger().level).toBe("silent");
    expect(service.getLogger("scoped").level).toBe("silent");
  });

  it("writes JSON lines to the configured log file", () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "logger-file-"));
    const file = path.join(dir, "logs", "run.log");
    try {
      const service = new LoggerService({ level: "info", file });

      service.getLogger("files").info("written");
      service.getLogger("files").debug("below level");

      const lines = fs.readFileSync(file, "utf-8").trim().split("\n");
      expect(lines).toHaveLength(1);
      expect(JSON.parse(lines[0] ?? "")).toMatchObject({ level: 30, scope: "files", msg: "written" });
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});
