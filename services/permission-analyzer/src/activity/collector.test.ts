import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { bisectWindow, collectActivity, dedupeActivities } from "./collector";
import type {
  ActivityLogSource,
  ActivityQueryOutcome,
  ActivityWindow,
} from "./types";

const GRAPH = "https://graph.microsoft.com";
const DAY = 24 * 60 * 60 * 1000;
const T = Date.parse("2024-01-01T00:00:00.000Z");

function window(fromDay: number, toDay: number, maxEntries = 100000): ActivityWindow {
  return {
    start: new Date(T + fromDay * DAY),
    end: new Date(T + toDay * DAY),
    maxEntries,
  };
}

function scriptedSource(
  respond: (window: ActivityWindow) => ActivityQueryOutcome,
): ActivityLogSource & { calls: ActivityWindow[] } {
  const calls: ActivityWindow[] = [];
  return {
    calls,
    queryActivity: vi.fn(async (_principalId: string, w: ActivityWindow) => {
      calls.push(w);
      return respond(w);
    }),
  };
}

describe("bisectWindow", () => {
  it("splits at the midpoint and halves the row budget", () => {
    expect(bisectWindow(window(0, 30))).toEqual([window(0, 15, 50000), window(15, 30, 50000)]);
  });

  it("never drops the row budget below one", () => {
    const [first, second] = bisectWindow(window(0, 2, 1));

    expect(first.maxEntries).toBe(1);
    expect(second.maxEntries).toBe(1);
  });

  it("produces halves that tile the original window", () => {
    const original: ActivityWindow = {
      start: new Date(T),
      end: new Date(T + 7),
      maxEntries: 5,
    };
    const [first, second] = bisectWindow(original);

    expect(first.start).toEqual(original.start);
    expect(first.end).toEqual(second.start);
    expect(second.end).toEqual(original.end);
    expect(first.end.getTime()).toBe(T + 3);
    expect(first.maxEntries).toBe(2);
  });
});

describe("dedupeActivities", () => {
  it("collapses calls that canonicalize to the same pattern", () => {
    expect(
      dedupeActivities([
        { method: "get", uri: `${GRAPH}/v1.0/users/1` },
        { method: "GET", uri: `${GRAPH}/v1.0/users/2?$select=id` },
        { method: "POST", uri: `${GRAPH}/v1.0/users/3` },
      ]),
    ).toEqual([
      { method: "GET", uri: `${GRAPH}/v1.0/users/{id}` },
      { method: "POST", uri: `${GRAPH}/v1.0/users/{id}` },
    ]);
  });
});

describe("collectActivity", () => {
  beforeEach(() => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("returns the activity of a window that fits", async () => {
    const source = scriptedSource(() => ({
      status: "ok",
      activities: [{ method: "GET", uri: `${GRAPH}/v1.0/users/42` }],
    }));

    const outcome = await collectActivity(source, "sp-1", window(0, 30));

    expect(outcome).toEqual({
      status: "ok",
      activities: [{ method: "GET", uri: `${GRAPH}/v1.0/users/{id}` }],
      skippedWindows: [],
    });
    expect(source.calls).toHaveLength(1);
  });

  it("splits an oversized window and merges both halves", async () => {
    const source = scriptedSource((w) => {
      if (w.end.getTime() - w.start.getTime() > 15 * DAY) {
        return { status: "size_exceeded", message: "TOO_MANY_ROWS_OR_BYTES" };
      }
      return w.start.getTime() === T
        ? {
            status: "ok",
            activities: [
              { method: "GET", uri: `${GRAPH}/v1.0/users` },
              { method: "GET", uri: `${GRAPH}/v1.0/groups/1` },
            ],
          }
        : {
            status: "ok",
            activities: [
              { method: "GET", uri: `${GRAPH}/v1.0/groups/2` },
              { method: "DELETE", uri: `${GRAPH}/v1.0/groups/2` },
            ],
          };
    });

    const outcome = await collectActivity(source, "sp-1", window(0, 30));

    expect(source.calls).toEqual([window(0, 30), window(0, 15, 50000), window(15, 30, 50000)]);
    expect(outcome).toEqual({
      status: "ok",
      activities: [
        { method: "GET", uri: `${GRAPH}/v1.0/users` },
        { method: "GET", uri: `${GRAPH}/v1.0/groups/{id}` },
        { method: "DELETE", uri: `${GRAPH}/v1.0/groups/{id}` },
      ],
      skippedWindows: [],
    });
  });

  it("isolates a dense day and keeps the rest of the window", async () => {
    const hot = T + 10 * DAY + 60 * 60 * 1000;
    const okWindows: ActivityWindow[] = [];
    const source = scriptedSource((w) => {
      if (w.start.getTime() <= hot && hot < w.end.getTime()) {
        return { status: "size_exceeded", message: "TOO_MANY_ROWS_OR_BYTES" };
      }
      okWindows.push(w);
      // One distinct, digit-free path per window
      const tag = String(w.start.getTime()).replace(/\d/g, (d) => "abcdefghij"[Number(d)]);
      return { status: "ok", activities: [{ method: "GET", uri: `${GRAPH}/v1.0/${tag}` }] };
    });

    const outcome = await collectActivity(source, "sp-1", window(0, 30));

    expect(outcome.status).toBe("ok");
    if (outcome.status !== "ok") return;

    expect(outcome.skippedWindows).toEqual([
      {
        start: new Date("2024-01-10T09:00:00.000Z"),
        end: new Date("2024-01-11T07:30:00.000Z"),
        maxEntries: 3125,
      },
    ]);
    expect(okWindows.map((w) => w.start.toISOString())).toEqual([
      "2024-01-01T00:00:00.000Z",
      "2024-01-08T12:00:00.000Z",
      "2024-01-11T07:30:00.000Z",
      "2024-01-12T06:00:00.000Z",
      "2024-01-16T00:00:00.000Z",
    ]);
    expect(outcome.activities).toHaveLength(okWindows.length);

    const covered = [...okWindows, ...outcome.skippedWindows].reduce(
      (sum, w) => sum + (w.end.getTime() - w.start.getTime()),
      0,
    );
    expect(covered).toBe(30 * DAY);
    expect(console.warn).toHaveBeenCalledTimes(1);
  });

  it("skips a one-day window that overflows without splitting it", async () => {
    const source = scriptedSource(() => ({
      status: "size_exceeded",
      message: "TOO_MANY_ROWS_OR_BYTES",
    }));

    const outcome = await collectActivity(source, "sp-1", window(0, 1));

    expect(outcome).toEqual({
      status: "ok",
      activities: [],
      skippedWindows: [window(0, 1)],
    });
    expect(source.calls).toHaveLength(1);
    expect(console.warn).toHaveBeenCalledWith(
      "Activity for sp-1 exceeds the result size limit in 2024-01-01T00:00:00.000Z..2024-01-02T00:00:00.000Z, skipping window",
    );
  });

  it("honours a custom minimum window", async () => {
    const source = scriptedSource(() => ({
      status: "size_exceeded",
      message: "TOO_MANY_ROWS_OR_BYTES",
    }));

    const outcome = await collectActivity(source, "sp-1", window(0, 4), { minWindowMs: 2 * DAY });

    expect(outcome.status).toBe("ok");
    expect(source.calls).toEqual([window(0, 4), window(0, 2, 50000), window(2, 4, 50000)]);
  });

  it("fails on a non-size error without further queries", async () => {
    const source = scriptedSource(() => ({ status: "error", message: "Authentication failed" }));

    const outcome = await collectActivity(source, "sp-1", window(0, 30));

    expect(outcome).toEqual({ status: "failed", error: "Authentication failed" });
    expect(source.calls).toHaveLength(1);
  });

  it("fails when the second half errors", async () => {
    const source = scriptedSource((w) => {
      if (w.end.getTime() - w.start.getTime() > 15 * DAY) {
        return { status: "size_exceeded", message: "TOO_MANY_ROWS_OR_BYTES" };
      }
      if (w.start.getTime() === T) {
        return { status: "ok", activities: [{ method: "GET", uri: `${GRAPH}/v1.0/users` }] };
      }
      return { status: "error", message: "Connection reset" };
    });

    const outcome = await collectActivity(source, "sp-1", window(0, 30));

    expect(outcome).toEqual({ status: "failed", error: "Connection reset" });
  });

  it("returns empty activity for an idle principal", async () => {
    const source = scriptedSource(() => ({ status: "ok", activities: [] }));

    expect(await collectActivity(source, "sp-1", window(0, 30))).toEqual({
      status: "ok",
      activities: [],
      skippedWindows: [],
    });
  });
});
