import { expect, test, vi } from "vitest";

import { CredentialsError, PlayConsoleError } from "../src/core/errors";
import {
  ANDROID_PUBLISHER_BASE_URL,
  type PlayRequest,
  REVOKED_CREDENTIALS_MESSAGE,
  createPlayConsoleClient,
  readErrorStatus,
} from "../src/infra/play/client";

const appUrl = `${ANDROID_PUBLISHER_BASE_URL}/com.example.app`;

const productionTrack = {
  track: "production",
  releases: [
    {
      name: "1.2.0",
      status: "inProgress",
      userFraction: 0.2,
      versionCodes: ["120"],
    },
  ],
};

function httpError(message: string, status: number): Error {
  return Object.assign(new Error(message), { response: { status } });
}

function createFakeTransport(
  handlers: Partial<Record<PlayRequest["method"], () => unknown>>
) {
  const requests: PlayRequest[] = [];
  const transport = async (request: PlayRequest): Promise<unknown> => {
    requests.push(request);
    const handler = handlers[request.method];
    return handler ? handler() : {};
  };
  return { requests, transport };
}

test("getTrack reads the track inside a throwaway edit", async () => {
  const { requests, transport } = createFakeTransport({
    POST: () => ({ id: "edit-1", expiryTimeSeconds: "1700000000" }),
    GET: () => productionTrack,
  });
  const client = createPlayConsoleClient({ transport });

  const track = await client.getTrack("com.example.app", "production");

  expect(track).toEqual(productionTrack);
  expect(requests).toEqual([
    { url: `${appUrl}/edits`, method: "POST" },
    { url: `${appUrl}/edits/edit-1/tracks/production`, method: "GET" },
    { url: `${appUrl}/edits/edit-1`, method: "DELETE" },
  ]);
});

test("getTrack maps 401 responses to revoked credentials", async () => {
  const { requests, transport } = createFakeTransport({
    POST: () => {
      throw httpError("Request failed with status code 401", 401);
    },
  });
  const client = createPlayConsoleClient({ transport });

  await expect(client.getTrack("com.example.app", "production")).rejects.toThrow(
    new CredentialsError(REVOKED_CREDENTIALS_MESSAGE)
  );
  expect(requests).toHaveLength(1);
});

test("getTrack maps invalid_grant token failures to revoked credentials", async () => {
  const { transport } = createFakeTransport({
    POST: () => {
      throw new Error("invalid_grant: Invalid JWT Signature.");
    },
  });
  const client = createPlayConsoleClient({ transport });

  await expect(
    client.getTrack("com.example.app", "production")
  ).rejects.toBeInstanceOf(CredentialsError);
});

test("getTrack reports API failures and still discards the edit", async () => {
  const { requests, transport } = createFakeTransport({
    POST: () => ({ id: "edit-1" }),
    GET: () => {
      throw httpError("Track not found", 404);
    },
  });
  const client = createPlayConsoleClient({ transport });

  const error = await client
    .getTrack("com.example.app", "nightly")
    .catch((caught: unknown) => caught);

  expect(error).toBeInstanceOf(PlayConsoleError);
  expect(error).toMatchObject({
    message: "Play Console request failed (HTTP 404): Track not found",
    statusCode: 404,
  });
  expect(requests.map((request) => request.method)).toEqual([
    "POST",
    "GET",
    "DELETE",
  ]);
});

test("getTrack rejects malformed responses", async () => {
  const { transport } = createFakeTransport({
    POST: () => ({ id: "edit-1" }),
    GET: () => ({ track: "production", releases: "nope" }),
  });
  const client = createPlayConsoleClient({ transport });

  await expect(client.getTrack("com.example.app", "production")).rejects.toThrow(
    /^Unexpected track response for production/
  );

  const missingEdit = createFakeTransport({ POST: () => ({}) });
  await expect(
    createPlayConsoleClient({ transport: missingEdit.transport }).getTrack(
      "com.example.app",
      "production"
    )
  ).rejects.toThrow(/^Unexpected edit response for com\.example\.app/);
});

test("getTrack warns when the edit cannot be discarded", async () => {
  const onWarning = vi.fn();
  const { transport } = createFakeTransport({
    POST: () => ({ id: "edit-1" }),
    GET: () => productionTrack,
    DELETE: () => {
      throw new Error("boom");
    },
  });
  const client = createPlayConsoleClient({ transport, onWarning });

  await expect(client.getTrack("com.example.app", "production")).resolves.toEqual(
    productionTrack
  );
  expect(onWarning).toHaveBeenCalledWith("Could not delete edit: boom");
});

test("readErrorStatus only reads numeric response statuses", () => {
  expect(readErrorStatus(httpError("x", 503))).toBe(503);
  expect(readErrorStatus(new Error("x"))).toBeNull();
  expect(readErrorStatus({ response: { status: "503" } })).toBeNull();
  expect(readErrorStatus(null)).toBeNull();
});
