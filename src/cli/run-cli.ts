import packageJson from "../../package.json";
import { StepError, errorMessage } from "../core/errors";
import { sendWebhook } from "../infra/http/webhook";
import { loadStepManifest } from "../infra/manifest/step-manifest";
import {
  createGoogleTransport,
  createPlayConsoleClient,
} from "../infra/play/client";
import { parseArgs, parseCommand } from "./config/args";
import {
  finalizeInputs,
  findMissingInputs,
  mergeInputSources,
} from "./config/inputs";
import type { FlowDependencies } from "./flows";
import { runRolloutMessengerFlow } from "./flows/rollout-messenger-flow";
import { promptMissingInputs } from "./interactive/prompts";
import type { OutputStream } from "./ui";
import { type ClackUi, createClackUi } from "./ui/clack-ui";

export type RunCliOptions = {
  argv: readonly string[];
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  stdout?: OutputStream;
  stderr?: OutputStream;
  interactive?: boolean;
  manifestPath?: string;
  ui?: ClackUi;
  dependencies?: Partial<FlowDependencies>;
};

const HELP_TEXT = `rollout-messenger

Announces the next Google Play staged rollout increase to a Microsoft Teams channel.

Usage:
  rollout-messenger [track] [rollout_increase_steps] [package_name] [teams_webhook_url] [credentials_file]
  rollout-messenger --help
  rollout-messenger --version

Options:
  --track <name>              Track to check (production, beta, alpha, internal, …)
  --steps <list>              Rollout increase steps, e.g. 1,20,50,100
  --package-name <name>       Application package name
  --webhook-url <url>         Teams incoming webhook URL
  --credentials-file <path>   Service account JSON key file
  --increase-time <text>      When the next increase happens (default: 11 AM today)
  --halt-actions <yaml>       YAML list of { title, url, icon_url } halt buttons
  --report <file>             Write the JSON run report
  --debug-dump <dir>          Dump the track response and message payloads
  --dry-run                   Print the message instead of posting it

Every input can also be given as an environment variable named after the
step input (track, rollout_increase_steps, service_account_json_key_content, …).
`;

function writeLine(stream: OutputStream, line: string): void {
  stream.write(`${line}\n`);
}

export async function runCli(options: RunCliOptions): Promise<number> {
  const stdout = options.stdout ?? process.stdout;
  const stderr = options.stderr ?? process.stderr;
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();
  const args = options.argv.slice(2);
  const command = parseCommand(args);

  if (command === "version") {
    writeLine(stdout, packageJson.version);
    return 0;
  }

  if (command === "help") {
    writeLine(stdout, HELP_TEXT);
    return 0;
  }

  try {
    const parsed = parseArgs(args);
    const manifest = await loadStepManifest(options.manifestPath);
    let raw = mergeInputSources(parsed.inputs, env, manifest);

    const ui = options.ui ?? createClackUi({ stdout });
    ui.intro("rollout-messenger");

    const interactive =
      options.interactive ?? (Boolean(process.stdin.isTTY) && !env.CI);
    const missing = findMissingInputs(raw, manifest);
    if (missing.length > 0 && interactive) {
      const answers = await promptMissingInputs(ui, missing);
      if (answers === null) {
        ui.cancelAndExit("Cancelled.");
        return 0;
      }
      raw = { ...raw, ...answers };
    }

    const inputs = finalizeInputs(raw, manifest);
    await runRolloutMessengerFlow({
      cwd,
      inputs,
      manifest,
      ui,
      debugDumpDir: parsed.debugDumpDir,
      createClient:
        options.dependencies?.createClient ??
        ((keyFile) =>
          createPlayConsoleClient({
            transport: createGoogleTransport(keyFile),
            onWarning: (message) => ui.warn(message),
          })),
      sendWebhook: options.dependencies?.sendWebhook ?? sendWebhook,
      now: options.dependencies?.now,
    });

    ui.outro("Script ran successfully.");
    return 0;
  } catch (error: unknown) {
    writeLine(stderr, errorMessage(error));
    return error instanceof StepError ? error.exitCode : 1;
  }
}
