import { expect, test } from "vitest";

import { parseArgs, parseCommand } from "../src/cli/config/args";
import { InputError } from "../src/core/errors";

test("parseCommand recognizes help and version", () => {
  expect(parseCommand(["--help"])).toBe("help");
  expect(parseCommand(["help"])).toBe("help");
  expect(parseCommand(["-v"])).toBe("version");
  expect(parseCommand([])).toBe("run");
  expect(parseCommand(["production"])).toBe("run");
});

test("parseArgs maps positional arguments in step order", () => {
  expect(
    parseArgs([
      "production",
      "1,20,50,100",
      "com.example.app",
      "https://hooks.example.com/test",
      "./key.json",
    ])
  ).toEqual({
    command: "run",
    inputs: {
      track: "production",
      rollout_increase_steps: "1,20,50,100",
      package_name: "com.example.app",
      teams_webhook_url: "https://hooks.example.com/test",
      service_account_json_key_path: "./key.json",
    },
    debugDumpDir: undefined,
  });
});

test("parseArgs lets flags win over positionals", () => {
  const parsed = parseArgs([
    "--track=beta",
    "--steps",
    "5,10",
    "--dry-run",
    "--debug-dump",
    "dumps",
    "internal",
  ]);

  expect(parsed.inputs).toEqual({
    track: "beta",
    rollout_increase_steps: "5,10",
    dry_run: "yes",
  });
  expect(parsed.debugDumpDir).toBe("dumps");
});

test("parseArgs rejects unknown flags and missing values", () => {
  expect(() => parseArgs(["--nope"])).toThrow(
    new InputError("Unknown option: --nope")
  );
  expect(() => parseArgs(["--steps"])).toThrow("--steps expects a value");
  expect(() => parseArgs(["--steps", "--dry-run"])).toThrow(
    "--steps expects a value"
  );
  expect(() => parseArgs(["a", "b", "c", "d", "e", "f"])).toThrow(
    "Expected at most 5 positional arguments, got 6"
  );
});
