import { describe, test, expect } from "vitest";
import { createLogger, createRootLogger } from "./logger";

describe("logger", () => {
  test("root logger uses the requested level", () => {
    expect(createRootLogger("warn").level).toBe("warn");
    expect(createRootLogger().level).toBe("info");
  });

  test("child loggers carry the service name and inherit the level", () => {
    const child = createLogger(createRootLogger("debug"), "engine");

    expect(child.bindings()).toEqual({ service: "engine" });
    expect(child.level).toBe("debug");
  });
});
