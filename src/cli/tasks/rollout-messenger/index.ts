import fs from "node:fs/promises";
import path from "node:path";

import { buildRolloutCard } from "../../../core/card/build";
import type { HaltAction, TeamsMessage } from "../../../core/card/types";
import type { RolloutReport } from "../../../core/report/types";
import { evaluateTrack } from "../../../core/rollout/evaluate";
import type { RolloutDecision, TrackInfo } from "../../../core/rollout/types";
import {
  assertReadableKeyFile,
  withCredentialsFile,
} from "../../../infra/fs/credentials";
import type { PlayConsoleClient } from "../../../infra/play/client";
import type { CredentialsSource } from "../../config/inputs";

export async function withKeyFile<TResult>(
  credentials: CredentialsSource,
  work: (keyFile: string) => Promise<TResult>
): Promise<TResult> {
  if (credentials.kind === "content") {
    return withCredentialsFile(credentials.content, work);
  }
  await assertReadableKeyFile(credentials.path);
  return work(credentials.path);
}

export async function collectTrackDecisions(options: {
  client: PlayConsoleClient;
  packageName: string;
  track: string;
  steps: readonly number[];
}): Promise<{ trackInfo: TrackInfo; decisions: RolloutDecision[] }> {
  const trackInfo = await options.client.getTrack(
    options.packageName,
    options.track
  );
  return { trackInfo, decisions: evaluateTrack(trackInfo, options.steps) };
}

export function buildDecisionCard(
  decision: Extract<RolloutDecision, { kind: "increase" }>,
  options: {
    packageName: string;
    track: string;
    increaseTime: string;
    haltActions: readonly HaltAction[];
  }
): TeamsMessage {
  return buildRolloutCard({
    packageName: options.packageName,
    track: options.track,
    releaseName: decision.release.name,
    from: decision.from,
    to: decision.to,
    increaseTime: options.increaseTime,
    haltActions: options.haltActions,
  });
}

export async function writeDebugDump(
  dir: string,
  fileName: string,
  data: unknown
): Promise<string> {
  await fs.mkdir(dir, { recursive: true });
  const outPath = path.join(dir, fileName);
  await fs.writeFile(outPath, `${JSON.stringify(data, null, 2)}\n`);
  return outPath;
}

export async function writeRolloutReportJson(options: {
  cwd: string;
  filePath: string;
  report: RolloutReport;
}): Promise<string> {
  const outPath = path.resolve(options.cwd, options.filePath);
  await fs.mkdir(path.dirname(outPath), { recursive: true });
  await fs.writeFile(outPath, `${JSON.stringify(options.report, null, 2)}\n`);
  return outPath;
}
