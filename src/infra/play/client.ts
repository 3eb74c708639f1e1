import { GoogleAuth } from "google-auth-library";

import {
  CredentialsError,
  PlayConsoleError,
  errorMessage,
} from "../../core/errors";
import type { TrackInfo } from "../../core/rollout/types";
import { editSchema, trackSchema } from "./schema";

export const ANDROID_PUBLISHER_SCOPE =
  "https://www.googleapis.com/auth/androidpublisher";
export const ANDROID_PUBLISHER_BASE_URL =
  "https://androidpublisher.googleapis.com/androidpublisher/v3/applications";

export const REVOKED_CREDENTIALS_MESSAGE =
  "The credentials have been revoked or expired, please re-run the application to re-authorize";

export type PlayRequest = {
  url: string;
  method: "GET" | "POST" | "DELETE";
};

/** Performs an authorized request and resolves with the decoded JSON body. */
export type PlayTransport = (request: PlayRequest) => Promise<unknown>;

export type PlayConsoleClient = {
  getTrack(packageName: string, track: string): Promise<TrackInfo>;
};

export type CreatePlayConsoleClientOptions = {
  transport: PlayTransport;
  onWarning?: (message: string) => void;
};

export function createGoogleTransport(keyFile: string): PlayTransport {
  const auth = new GoogleAuth({ keyFile, scopes: [ANDROID_PUBLISHER_SCOPE] });
  return async (request) => {
    const response = await auth.request<unknown>({
      url: request.url,
      method: request.method,
    });
    return response.data;
  };
}

export function createPlayConsoleClient(
  options: CreatePlayConsoleClientOptions
): PlayConsoleClient {
  const { transport } = options;

  async function call(request: PlayRequest): Promise<unknown> {
    try {
      return await transport(request);
    } catch (error: unknown) {
      throw toPlayError(error);
    }
  }

  async function getTrack(
    packageName: string,
    track: string
  ): Promise<TrackInfo> {
    const appUrl = `${ANDROID_PUBLISHER_BASE_URL}/${encodeURIComponent(packageName)}`;
    const edit = editSchema.safeParse(
      await call({ url: `${appUrl}/edits`, method: "POST" })
    );
    if (!edit.success) {
      throw new PlayConsoleError(
        `Unexpected edit response for ${packageName}: ${edit.error.message}`
      );
    }

    const editUrl = `${appUrl}/edits/${encodeURIComponent(edit.data.id)}`;
    try {
      const parsed = trackSchema.safeParse(
        await call({
          url: `${editUrl}/tracks/${encodeURIComponent(track)}`,
          method: "GET",
        })
      );
      if (!parsed.success) {
        throw new PlayConsoleError(
          `Unexpected track response for ${track}: ${parsed.error.message}`
        );
      }
      return parsed.data;
    } finally {
      await discardEdit(editUrl);
    }
  }

  // Edits are read-only here; an edit left behind expires on its own.
  async function discardEdit(editUrl: string): Promise<void> {
    try {
      await transport({ url: editUrl, method: "DELETE" });
    } catch (error: unknown) {
      options.onWarning?.(`Could not delete edit: ${errorMessage(error)}`);
    }
  }

  return { getTrack };
}

export function readErrorStatus(error: unknown): number | null {
  if (typeof error !== "object" || error === null || !("response" in error)) {
    return null;
  }
  const { response } = error;
  if (
    typeof response === "object" &&
    response !== null &&
    "status" in response &&
    typeof response.status === "number"
  ) {
    return response.status;
  }
  return null;
}

export function toPlayError(error: unknown): Error {
  if (error instanceof PlayConsoleError || error instanceof CredentialsError) {
    return error;
  }
  const status = readErrorStatus(error);
  const message = errorMessage(error);
  if (status === 401 || message.includes("invalid_grant")) {
    return new CredentialsError(REVOKED_CREDENTIALS_MESSAGE);
  }
  return new PlayConsoleError(
    status === null
      ? `Play Console request failed: ${message}`
      : `Play Console request failed (HTTP ${status}): ${message}`,
    status
  );
}
