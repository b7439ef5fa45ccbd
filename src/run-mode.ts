import { parseArgs } from "node:util";

export type RunMode =
  | { kind: "digest" }
  | { kind: "commands"; durationSeconds: number }
  | { kind: "webhook" };

/**
 * Decode command-line flags. `--duration` falls back to the configured poll time.
 */
export function parseRunMode(argv: string[], defaultDurationSeconds: number): RunMode {
  const { values } = parseArgs({
    args: argv,
    options: {
      commands: { type: "boolean" },
      "commands-only": { type: "boolean" },
      duration: { type: "string" },
      webhook: { type: "boolean" },
    },
    strict: false,
  });

  if (values.webhook === true) {
    return { kind: "webhook" };
  }
  if (values.commands === true || values["commands-only"] === true) {
    const raw = typeof values.duration === "string" ? Number(values.duration) : NaN;
    const durationSeconds =
      Number.isFinite(raw) && raw > 0 ? Math.floor(raw) : defaultDurationSeconds;
    return { kind: "commands", durationSeconds };
  }
  return { kind: "digest" };
}
