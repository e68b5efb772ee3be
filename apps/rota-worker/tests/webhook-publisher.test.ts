import { describe, it, expect, vi } from "vitest";
import type { ScheduleConfig, SummaryDocument } from "@rota/shared";
import { WebhookError, WebhookPublisher } from "../src/adapters/webhook-publisher.js";

const config: ScheduleConfig = {
  tenantId: "guild-1",
  summaryChannel: "https://hooks.test/channel/",
  summaryMessage: "msg-1",
  briefingSource: null,
};

const doc: SummaryDocument = {
  tenantId: "guild-1",
  title: "Event Schedule",
  generatedAt: "2025-10-22T12:00:00.000Z",
  year: 2025,
  editors: [],
  instructors: [],
  sections: [],
};

describe("WebhookPublisher", () => {
  it("PATCHes the summary message with the rendered embed", async () => {
    const fetchFn = vi.fn(async (_url: string, _init: RequestInit) => new Response(null, { status: 204 }));
    await new WebhookPublisher(fetchFn).publish(config, doc);

    const [url, init] = fetchFn.mock.calls[0];
    expect(url).toBe("https://hooks.test/channel/messages/msg-1");
    expect(init.method).toBe("PATCH");
    const body = JSON.parse(String(init.body));
    expect(body.embeds).toHaveLength(1);
    expect(body.embeds[0].title).toBe("Event Schedule");
    expect(body.embeds[0].fields).toEqual([]);
  });

  it("marks client errors as permanent", async () => {
    const publisher = new WebhookPublisher(async () => new Response("Unknown Message", { status: 404 }));
    const err = await publisher.publish(config, doc).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(WebhookError);
    expect(err instanceof WebhookError && err.permanent).toBe(true);
    expect(err instanceof WebhookError && err.message).toBe(
      "webhook responded 404: Unknown Message",
    );
  });

  it("treats rate limits and server errors as transient", () => {
    expect(new WebhookError(429, "").permanent).toBe(false);
    expect(new WebhookError(502, "").permanent).toBe(false);
  });
});
