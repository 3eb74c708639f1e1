export { runCli, type RunCliOptions } from "./cli/run-cli";
export {
  runRolloutMessengerFlow,
  type RolloutMessengerFlowOptions,
} from "./cli/flows/rollout-messenger-flow";
export {
  finalizeInputs,
  mergeInputSources,
  type StepInputs,
} from "./cli/config/inputs";
export { buildRolloutCard, type RolloutCardInput } from "./core/card/build";
export type { HaltAction, TeamsMessage } from "./core/card/types";
export * from "./core/errors";
export type { RolloutReport } from "./core/report/types";
export { evaluateTrack } from "./core/rollout/evaluate";
export { formatPercent, parseRolloutSteps } from "./core/rollout/steps";
export type {
  RolloutDecision,
  TrackInfo,
  TrackRelease,
} from "./core/rollout/types";
export { sendWebhook, type WebhookResult } from "./infra/http/webhook";
export {
  loadStepManifest,
  type StepManifest,
} from "./infra/manifest/step-manifest";
export {
  createGoogleTransport,
  createPlayConsoleClient,
  type PlayConsoleClient,
  type PlayTransport,
} from "./infra/play/client";
