// Briefing matcher: maps an event's free-text label onto one of the titles
// published by a briefing source. Strategies run in priority order and the
// first one that produces a candidate wins; every step checks the deadline.
import { distance } from "fastest-levenshtein";

export type MatchStrategyName =
  | "exact"
  | "normalized"
  | "substring"
  | "keywords"
  | "fuzzy";

export type BriefingMatch = {
  title: string;
  strategy: MatchStrategyName;
  score: number;
};

export type MatchOutcome =
  | { matched: true; match: BriefingMatch }
  | { matched: false; reason: "no_candidates" | "no_match" | "deadline" };

export const BRIEFING_DEADLINE_MS = 5_000;

export const MATCH_THRESHOLDS = {
  /** Shorter side of a containment match must have at least this many chars. */
  substringMinChars: 4,
  /** Shared tokens / tokens of the longer side. */
  keywordOverlap: 0.5,
  /** 1 - levenshtein / max(len). */
  fuzzyRatio: 0.8,
} as const;

const STOPWORDS = new Set(["a", "an", "and", "for", "in", "of", "on", "the", "to"]);

/** Wall-clock budget measured from construction. */
export class Deadline {
  private readonly expiresAt: number;
  private readonly now: () => number;

  constructor(budgetMs: number, now: () => number = Date.now) {
    this.now = now;
    this.expiresAt = now() + budgetMs;
  }

  remainingMs() {
    return Math.max(0, this.expiresAt - this.now());
  }

  expired() {
    return this.now() >= this.expiresAt;
  }
}

export type MatchContext = {
  eventName: string;
  candidates: readonly string[];
  deadline: Deadline;
};

/** Returns null both for "nothing cleared the bar" and "ran out of time". */
export type MatchStrategy = {
  name: MatchStrategyName;
  run(ctx: MatchContext): BriefingMatch | null;
};

export function normalizeTitle(s: string) {
  return s
    .normalize("NFKD")
    .replace(/[\u0300-\u036f]/g, "")
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, " ")
    .trim();
}

export function tokenize(s: string) {
  return new Set(
    normalizeTitle(s)
      .split(" ")
      .filter((t) => t.length > 1 && !STOPWORDS.has(t)),
  );
}

const compact = (s: string) => normalizeTitle(s).replace(/ /g, "");

// Title order is the tie-break everywhere: earlier in lexical order wins.
function better(a: BriefingMatch | null, b: BriefingMatch) {
  if (!a) return true;
  if (b.score !== a.score) return b.score > a.score;
  return b.title < a.title;
}

function firstEqual(
  ctx: MatchContext,
  name: MatchStrategyName,
  key: (s: string) => string,
): BriefingMatch | null {
  const wanted = key(ctx.eventName);
  if (!wanted) return null;
  let best: BriefingMatch | null = null;
  for (const title of ctx.candidates) {
    if (ctx.deadline.expired()) return null;
    if (key(title) !== wanted) continue;
    const hit = { title, strategy: name, score: 1 };
    if (better(best, hit)) best = hit;
  }
  return best;
}

export const exactStrategy: MatchStrategy = {
  name: "exact",
  run: (ctx) => firstEqual(ctx, "exact", (s) => s.trim().toLowerCase()),
};

export const normalizedStrategy: MatchStrategy = {
  name: "normalized",
  run: (ctx) => firstEqual(ctx, "normalized", compact),
};

export const substringStrategy: MatchStrategy = {
  name: "substring",
  run(ctx) {
    const name = normalizeTitle(ctx.eventName);
    let best: BriefingMatch | null = null;
    for (const title of ctx.candidates) {
      if (ctx.deadline.expired()) return null;
      const t = normalizeTitle(title);
      const [short, long] = name.length <= t.length ? [name, t] : [t, name];
      if (short.length < MATCH_THRESHOLDS.substringMinChars) continue;
      if (!long.includes(short)) continue;
      // Closer lengths rank higher: "thunderbolt" prefers "thunderbolt briefing"
      // over "thunderbolt briefing part two".
      const hit = { title, strategy: "substring" as const, score: short.length / long.length };
      if (better(best, hit)) best = hit;
    }
    return best;
  },
};

export const keywordStrategy: MatchStrategy = {
  name: "keywords",
  run(ctx) {
    const wanted = tokenize(ctx.eventName);
    if (wanted.size === 0) return null;
    let best: { match: BriefingMatch; shared: number } | null = null;
    for (const title of ctx.candidates) {
      if (ctx.deadline.expired()) return null;
      const tokens = tokenize(title);
      let shared = 0;
      for (const t of tokens) if (wanted.has(t)) shared++;
      const score = shared / Math.max(wanted.size, tokens.size);
      if (score < MATCH_THRESHOLDS.keywordOverlap) continue;
      const hit = { title, strategy: "keywords" as const, score };
      if (
        !best ||
        score > best.match.score ||
        (score === best.match.score &&
          (shared > best.shared || (shared === best.shared && title < best.match.title)))
      ) {
        best = { match: hit, shared };
      }
    }
    return best?.match ?? null;
  },
};

export const fuzzyStrategy: MatchStrategy = {
  name: "fuzzy",
  run(ctx) {
    const name = normalizeTitle(ctx.eventName);
    if (!name) return null;
    let best: BriefingMatch | null = null;
    for (const title of ctx.candidates) {
      if (ctx.deadline.expired()) return null;
      const t = normalizeTitle(title);
      const score = 1 - distance(name, t) / Math.max(name.length, t.length);
      if (score < MATCH_THRESHOLDS.fuzzyRatio) continue;
      const hit = { title, strategy: "fuzzy" as const, score };
      if (better(best, hit)) best = hit;
    }
    return best;
  },
};

export const DEFAULT_STRATEGIES: readonly MatchStrategy[] = [
  exactStrategy,
  normalizedStrategy,
  substringStrategy,
  keywordStrategy,
  fuzzyStrategy,
];

export type MatchOptions = {
  deadlineMs?: number;
  strategies?: readonly MatchStrategy[];
  now?: () => number;
};

export function matchBriefing(
  eventName: string,
  candidates: readonly string[],
  opts: MatchOptions = {},
): MatchOutcome {
  const deadline = new Deadline(opts.deadlineMs ?? BRIEFING_DEADLINE_MS, opts.now);
  if (candidates.length === 0) return { matched: false, reason: "no_candidates" };

  const ctx: MatchContext = { eventName, candidates, deadline };
  for (const strategy of opts.strategies ?? DEFAULT_STRATEGIES) {
    if (deadline.expired()) return { matched: false, reason: "deadline" };
    const match = strategy.run(ctx);
    if (match) return { matched: true, match };
  }
  return deadline.expired()
    ? { matched: false, reason: "deadline" }
    : { matched: false, reason: "no_match" };
}

export type FetchOutcome<T> =
  | { ok: true; value: T }
  | { ok: false; reason: "timeout" | "error"; error?: unknown };

/**
 * Runs `fetch` with an AbortSignal that fires after `budgetMs`. A timeout
 * resolves as { ok: false } and aborts whatever the fetch still has in flight.
 */
export async function fetchWithDeadline<T>(
  fetch: (signal: AbortSignal) => Promise<T>,
  budgetMs: number,
): Promise<FetchOutcome<T>> {
  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<FetchOutcome<T>>((resolve) => {
    timer = setTimeout(() => {
      controller.abort();
      resolve({ ok: false, reason: "timeout" });
    }, budgetMs);
  });
  const attempt = fetch(controller.signal).then(
    (value): FetchOutcome<T> => ({ ok: true, value }),
    (error: unknown): FetchOutcome<T> =>
      controller.signal.aborted
        ? { ok: false, reason: "timeout" }
        : { ok: false, reason: "error", error },
  );
  try {
    return await Promise.race([attempt, timeout]);
  } finally {
    clearTimeout(timer);
  }
}
