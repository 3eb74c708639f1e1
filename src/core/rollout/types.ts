export type LocalizedText = {
  language: string;
  text: string;
};

export type TrackRelease = {
  name?: string;
  status: string;
  userFraction?: number;
  versionCodes?: string[];
  releaseNotes?: LocalizedText[];
};

export type TrackInfo = {
  track: string;
  releases?: TrackRelease[];
};

export type RolloutDecision =
  | { kind: "completed"; release: TrackRelease }
  | { kind: "halted"; release: TrackRelease }
  | { kind: "draft"; release: TrackRelease }
  | { kind: "unknown-status"; release: TrackRelease }
  | { kind: "at-maximum"; release: TrackRelease; from: number }
  | { kind: "increase"; release: TrackRelease; from: number; to: number };

export type RolloutDecisionKind = RolloutDecision["kind"];
