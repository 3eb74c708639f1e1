import { afterEach, expect, test, vi } from "vitest";

import { sendWebhook } from "../src/infra/http/webhook";

afterEach(() => {
  vi.unstubAllGlobals();
});

test("sendWebhook posts the payload as JSON and accepts 200", async () => {
  const fetchMock = vi.fn(async () => new Response("1", { status: 200 }));
  vi.stubGlobal("fetch", fetchMock);

  const result = await sendWebhook("https://hooks.example.com/test", {
    type: "message",
  });

  expect(result).toEqual({ success: true, status: 200, body: "1" });
  expect(fetchMock).toHaveBeenCalledTimes(1);
  expect(fetchMock).toHaveBeenCalledWith(
    "https://hooks.example.com/test",
    expect.objectContaining({
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: '{"type":"message"}',
    })
  );
});

test("sendWebhook accepts 202 with an empty body", async () => {
  vi.stubGlobal(
    "fetch",
    vi.fn(async () => new Response(null, { status: 202 }))
  );

  const result = await sendWebhook("https://hooks.example.com/test", {});

  expect(result).toEqual({ success: true, status: 202, body: "" });
});

test("sendWebhook reports other statuses as failures", async () => {
  vi.stubGlobal(
    "fetch",
    vi.fn(async () => new Response("Bad payload", { status: 400 }))
  );

  const result = await sendWebhook("https://hooks.example.com/test", {});

  expect(result).toEqual({
    success: false,
    status: 400,
    body: "Bad payload",
    error: "HTTP 400: Bad payload",
  });
});

test("sendWebhook never throws on transport errors", async () => {
  vi.stubGlobal(
    "fetch",
    vi.fn(async () => {
      throw new Error("connect ECONNREFUSED");
    })
  );

  const result = await sendWebhook("https://hooks.example.com/test", {});

  expect(result).toEqual({ success: false, error: "connect ECONNREFUSED" });
});
