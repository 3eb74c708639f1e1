import { InputError } from "../../core/errors";
import { type RawInputs, positionalInputs, valueFlags } from "./options";

export type CliCommand = "help" | "version" | "run";

export type ParsedArgs = {
  command: CliCommand;
  inputs: RawInputs;
  debugDumpDir?: string;
};

export function parseCommand(args: readonly string[]): CliCommand {
  const [first] = args;

  if (first === "--help" || first === "-h" || first === "help") {
    return "help";
  }

  if (first === "--version" || first === "-v" || first === "version") {
    return "version";
  }

  return "run";
}

function splitFlag(arg: string): { name: string; inlineValue?: string } {
  const body = arg.slice(2);
  const equalsIndex = body.indexOf("=");
  if (equalsIndex === -1) {
    return { name: body };
  }
  return {
    name: body.slice(0, equalsIndex),
    inlineValue: body.slice(equalsIndex + 1),
  };
}

export function parseArgs(args: readonly string[]): ParsedArgs {
  const command = parseCommand(args);
  const inputs: RawInputs = {};
  const positionals: string[] = [];
  let debugDumpDir: string | undefined;

  for (let index = 0; index < args.length; index += 1) {
    const arg = args[index];
    if (!arg.startsWith("--")) {
      positionals.push(arg);
      continue;
    }

    const { name, inlineValue } = splitFlag(arg);
    if (name === "dry-run") {
      inputs.dry_run = inlineValue ?? "yes";
      continue;
    }

    const takeValue = (): string => {
      if (inlineValue !== undefined) {
        return inlineValue;
      }
      const next = args[index + 1];
      if (next === undefined || next.startsWith("--")) {
        throw new InputError(`--${name} expects a value`);
      }
      index += 1;
      return next;
    };

    if (name === "debug-dump") {
      debugDumpDir = takeValue();
      continue;
    }

    const inputName = valueFlags[name];
    if (inputName === undefined) {
      throw new InputError(`Unknown option: --${name}`);
    }
    inputs[inputName] = takeValue();
  }

  if (positionals.length > positionalInputs.length) {
    throw new InputError(
      `Expected at most ${positionalInputs.length} positional arguments, got ${positionals.length}`
    );
  }
  positionals.forEach((value, position) => {
    const inputName = positionalInputs[position];
    inputs[inputName] ??= value;
  });

  return { command, inputs, debugDumpDir };
}
