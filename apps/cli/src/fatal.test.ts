import pino from "pino";
import { describe, it, expect } from "vitest";

import { ConfigError } from "./config/errors";
import { reportFatalError } from "./fatal";

function recordingLogger() {
  const lines: Array<Record<string, unknown>> = [];
  const logger = pino(
    { level: "error" },
    {
      write(line: string) {
        lines.push(JSON.parse(line) as Record<string, unknown>);
      },
    }
  );
  return { logger, lines };
}

describe("reportFatalError", () => {
  it("writes one structured line for a configuration error", () => {
    const { logger, lines } = recordingLogger();

    reportFatalError(new ConfigError("Config file not found: /cfg/x.json", "/cfg/x.json"), logger);

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatchObject({
      level: 50,
      msg: "Configuration error: Config file not found: /cfg/x.json",
      configPath: "/cfg/x.json",
      err: { type: "ConfigError", message: "Config file not found: /cfg/x.json" },
    });
  });

  it("logs any other error with its message", () => {
    const { logger, lines } = recordingLogger();

    reportFatalError(new Error("disk full"), logger);

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatchObject({ level: 50, msg: "Fatal error", err: { type: "Error", message: "disk full" } });
  });
});
