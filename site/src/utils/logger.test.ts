import { createLogger, formatLogLine, logger } from "./logger";

describe("logger", () => {
  test("formats a pino record as one line", () => {
    const line = formatLogLine(
      JSON.stringify({ level: "INFO", time: "2024-03-05T10:20:30.123Z", file: "builder", msg: "done" }),
    );
    expect(line).toBe("INFO  2024-03-05T10:20:30 builder    done\n");
  });

  test("passes through text that is not a JSON record", () => {
    expect(formatLogLine("plain text")).toBe("plain text\n");
    expect(formatLogLine("null")).toBe("null\n");
  });

  test("pads missing fields", () => {
    expect(formatLogLine('{"msg":"x"}')).toBe(" ".repeat(18) + "x\n");
  });

  test("shares one root logger", () => {
    const child = createLogger({ file: "test" });
    expect(child.bindings()).toStrictEqual({ file: "test" });
    expect(child.level).toBe(logger.level);
  });
});
