import { z } from "zod";

export type BriefingTitle = {
  title: string;
  url: string | null;
};

/** External collection of briefing document titles. May fail or hang. */
export interface BriefingTitleSource {
  listTitles(source: string, signal: AbortSignal): Promise<BriefingTitle[]>;
}

// Either a bare list of titles or a list of forum-style threads
const TitleList = z.union([
  z.array(z.string()),
  z.array(z.object({ name: z.string(), url: z.string().url().optional() }).passthrough()),
]);

type FetchFn = (url: string, init: { signal: AbortSignal; headers: Record<string, string> }) => Promise<Response>;

/** GETs `source` as JSON. */
export class HttpBriefingTitleSource implements BriefingTitleSource {
  constructor(private readonly fetchFn: FetchFn = fetch) {}

  async listTitles(source: string, signal: AbortSignal) {
    const res = await this.fetchFn(source, {
      signal,
      headers: { accept: "application/json" },
    });
    if (!res.ok) {
      throw new Error(`briefing source responded ${res.status}`);
    }
    const body = TitleList.parse(await res.json());
    return body.map((t): BriefingTitle =>
      typeof t === "string" ? { title: t, url: null } : { title: t.name, url: t.url ?? null },
    );
  }
}
