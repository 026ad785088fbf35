import { formatMessage, parseLogLevel, setLogLevel, shouldLog } from "./logger.js";

describe("parseLogLevel", () => {
  it.each([
    ["debug", "debug"],
    ["WARN", "warn"],
    [" error ", "error"],
    ["info", "info"]
  ] as const)("parses %s", (raw, expected) => {
    expect(parseLogLevel(raw)).toBe(expected);
  });

  it("falls back to info for unknown or missing values", () => {
    expect(parseLogLevel("verbose")).toBe("info");
    expect(parseLogLevel(undefined)).toBe("info");
  });
});

describe("shouldLog", () => {
  afterEach(() => {
    setLogLevel("info");
  });

  it("suppresses levels below the threshold", () => {
    setLogLevel("warn");
    expect(shouldLog("info")).toBe(false);
    expect(shouldLog("warn")).toBe(true);
    expect(shouldLog("error")).toBe(true);
  });

  it("lets everything through at debug", () => {
    setLogLevel("debug");
    expect(shouldLog("debug")).toBe(true);
  });
});

describe("formatMessage", () => {
  const at = new Date("2024-05-01T12:00:00.000Z");

  it("prefixes timestamp and level", () => {
    expect(formatMessage("info", "Reading file", [], at)).toBe(
      "[2024-05-01T12:00:00.000Z] [INFO] Reading file"
    );
  });

  it("appends formatted arguments", () => {
    expect(formatMessage("error", "Failed:", [new TypeError("bad"), { n: 1 }, 3], at)).toBe(
      '[2024-05-01T12:00:00.000Z] [ERROR] Failed: TypeError: bad {"n":1} 3'
    );
  });

  it("does not throw on circular objects", () => {
    const circular: Record<string, unknown> = {};
    circular.self = circular;
    expect(formatMessage("warn", "Circular:", [circular], at)).toBe(
      "[2024-05-01T12:00:00.000Z] [WARN] Circular: [object Object]"
    );
  });
});
