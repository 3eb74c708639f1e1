import { WebhookError } from "../../core/errors";
import type { RolloutReport } from "../../core/report/types";
import { describeRelease } from "../../core/rollout/evaluate";
import { formatPercent, parseRolloutSteps } from "../../core/rollout/steps";
import type { RolloutDecision } from "../../core/rollout/types";
import type { StepManifest } from "../../infra/manifest/step-manifest";
import { type StepInputs, describeInputs } from "../config/inputs";
import {
  buildDecisionCard,
  collectTrackDecisions,
  withKeyFile,
  writeDebugDump,
  writeRolloutReportJson,
} from "../tasks/rollout-messenger";
import {
  type DecisionOutcome,
  buildRolloutReport,
} from "../tasks/rollout-messenger/report/build";
import { formatRolloutSummary } from "../tasks/rollout-messenger/report/format";
import type { UiSession } from "../ui";
import type { FlowDependencies } from "./index";

export type RolloutMessengerFlowOptions = FlowDependencies & {
  cwd: string;
  inputs: StepInputs;
  manifest: StepManifest;
  ui: UiSession;
  debugDumpDir?: string;
};

function logSkippedDecision(ui: UiSession, decision: RolloutDecision): void {
  const release = describeRelease(decision.release);
  switch (decision.kind) {
    case "completed":
      ui.info(`Release ${release} is completed. No messaging needed.`);
      return;
    case "halted":
      ui.warn(`Release ${release} was halted. Skipping messaging.`);
      return;
    case "draft":
      ui.info(`Release ${release} is a draft. Skipping messaging.`);
      return;
    case "unknown-status":
      ui.warn(
        `Release ${release} has status ${decision.release.status}. Skipping messaging.`
      );
      return;
    case "at-maximum":
      ui.info(
        `Release ${release} is at ${formatPercent(decision.from)}%. No higher rollout step found, already at or above the maximum configured value.`
      );
      return;
    case "increase":
      return;
  }
}

export async function runRolloutMessengerFlow(
  options: RolloutMessengerFlowOptions
): Promise<RolloutReport> {
  const { inputs, ui } = options;
  const now = options.now ?? (() => new Date());

  ui.step(`Checking phased release information for: ${inputs.packageName}`);
  ui.info(describeInputs(inputs, options.manifest).join("\n"));

  const steps = parseRolloutSteps(inputs.rolloutIncreaseSteps);
  const stepList = steps.map((step) => `${formatPercent(step)}%`).join(", ");
  ui.info(`Rollout steps are: ${stepList}`);

  const { trackInfo, decisions } = await withKeyFile(
    inputs.credentials,
    (keyFile) =>
      ui.runSpinner(
        `Reading ${inputs.track} track from the Play Console…`,
        () =>
          collectTrackDecisions({
            client: options.createClient(keyFile),
            packageName: inputs.packageName,
            track: inputs.track,
            steps,
          })
      )
  );

  if (options.debugDumpDir) {
    await writeDebugDump(options.debugDumpDir, "00-track.json", trackInfo);
  }

  if (decisions.length === 0) {
    ui.warn("Track has no releases. Skipping messages.");
  }

  const outcomes: DecisionOutcome[] = [];
  for (const [index, decision] of decisions.entries()) {
    const { release } = decision;
    ui.info(`Release ${describeRelease(release)} status is: ${release.status}`);
    if (decision.kind !== "increase") {
      logSkippedDecision(ui, decision);
      outcomes.push({ decision, notification: "skipped" });
      continue;
    }

    const from = formatPercent(decision.from);
    const to = formatPercent(decision.to);
    ui.step(`Messaging about increasing the rollout from ${from}% to ${to}%`);
    const message = buildDecisionCard(decision, inputs);
    if (options.debugDumpDir) {
      await writeDebugDump(
        options.debugDumpDir,
        `${String(index + 1).padStart(2, "0")}-card.json`,
        message
      );
    }

    if (inputs.dryRun) {
      ui.print(JSON.stringify(message, null, 2));
      outcomes.push({ decision, notification: "dry-run" });
      continue;
    }

    const result = await options.sendWebhook(inputs.teamsWebhookUrl, message);
    if (result.success) {
      ui.success(`Message sent: ${result.body ?? ""}`.trimEnd());
      outcomes.push({ decision, notification: "sent" });
    } else {
      const error = result.error ?? "Unknown error";
      ui.error(`Something went wrong whilst sending the message: ${error}`);
      outcomes.push({
        decision,
        notification: "failed",
        notificationError: error,
      });
    }
  }

  const report = buildRolloutReport({
    generatedAt: now().toISOString(),
    packageName: inputs.packageName,
    track: inputs.track,
    steps,
    dryRun: inputs.dryRun,
    outcomes,
  });
  ui.info(formatRolloutSummary(report));

  if (inputs.reportPath) {
    const outPath = await writeRolloutReportJson({
      cwd: options.cwd,
      filePath: inputs.reportPath,
      report,
    });
    ui.info(`Wrote ${outPath}`);
  }

  const failed = outcomes.filter(
    (outcome) => outcome.notification === "failed"
  );
  if (failed.length > 0) {
    throw new WebhookError(
      `Failed to deliver ${failed.length} rollout message(s) to the Teams webhook`
    );
  }

  return report;
}
