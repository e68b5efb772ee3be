import type { ScheduleConfig, SummaryDocument } from "@rota/shared";
import { renderSummaryEmbed } from "../templates/summary-embed.js";

export interface Publisher {
  publish(
    config: ScheduleConfig,
    document: SummaryDocument,
    opts?: { partial?: boolean },
  ): Promise<void>;
}

/** A non-2xx from the webhook; 4xx other than 429 will not succeed on retry. */
export class WebhookError extends Error {
  readonly status: number;
  readonly permanent: boolean;

  constructor(status: number, body: string) {
    super(`webhook responded ${status}: ${body.slice(0, 200)}`);
    this.name = "WebhookError";
    this.status = status;
    this.permanent = status >= 400 && status < 500 && status !== 429;
  }
}

type FetchFn = (url: string, init: RequestInit) => Promise<Response>;

/** Edits the tenant's summary message in place. */
export class WebhookPublisher implements Publisher {
  constructor(private readonly fetchFn: FetchFn = fetch) {}

  async publish(config: ScheduleConfig, document: SummaryDocument, opts: { partial?: boolean } = {}) {
    const url = `${config.summaryChannel.replace(/\/+$/, "")}/messages/${encodeURIComponent(
      config.summaryMessage,
    )}`;
    const res = await this.fetchFn(url, {
      method: "PATCH",
      headers: { "content-type": "application/json" },
      body: JSON.stringify({ embeds: [renderSummaryEmbed(document, opts)] }),
    });
    if (!res.ok) throw new WebhookError(res.status, await res.text());
  }
}
