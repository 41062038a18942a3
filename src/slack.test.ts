import { ErrorCode } from "@slack/web-api";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { SlackSender, describeSlackError } from "./slack.js";
import type { MessagePoster, PostMessageArgs } from "./slack.js";

function platformError(code: string) {
  return Object.assign(new Error(`An API error occurred: ${code}`), {
    code: ErrorCode.PlatformError,
    data: { ok: false, error: code },
  });
}

function fakePoster(fail?: unknown): MessagePoster & { calls: PostMessageArgs[] } {
  const calls: PostMessageArgs[] = [];
  return {
    calls,
    postMessage: async (args) => {
      calls.push(args);
      if (fail !== undefined) throw fail;
      return { ok: true };
    },
  };
}

describe("describeSlackError", () => {
  it("adds a scope hint", () => {
    expect(describeSlackError("missing_scope", "#dev")).toEqual([
      "Error sending message: missing_scope",
      "Your token needs 'chat:write' scope to send messages",
    ]);
  });

  it("names the channel", () => {
    expect(describeSlackError("channel_not_found", "#dev")).toEqual([
      "Channel #dev not found or bot doesn't have access",
    ]);
    expect(describeSlackError("not_in_channel", "#dev")[0]).toBe("Bot is not a member of #dev");
  });

  it("falls back to the raw code", () => {
    expect(describeSlackError("ratelimited", "#dev", "formatted message")).toEqual([
      "Error sending formatted message: ratelimited",
    ]);
  });
});

describe("SlackSender", () => {
  beforeEach(() => {
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("posts to the default channel with mrkdwn on", async () => {
    const poster = fakePoster();
    const sender = new SlackSender(poster, "#general");

    await expect(sender.send({ text: "hi" })).resolves.toBe(true);
    expect(poster.calls).toEqual([{ text: "hi", channel: "#general", mrkdwn: true }]);
    expect(console.error).toHaveBeenCalledWith("[info] Message sent to #general");
  });

  it("prefers an explicit destination", async () => {
    const poster = fakePoster();
    await new SlackSender(poster, "#general").send({ text: "hi" }, "@sam");
    expect(poster.calls[0].channel).toBe("@sam");
  });

  it("reports blocks as a formatted message", async () => {
    const poster = fakePoster();
    const sender = new SlackSender(poster, "#general");

    await sender.send({ text: "", blocks: [{ type: "divider" }] });
    expect(poster.calls[0].blocks).toEqual([{ type: "divider" }]);
    expect(console.error).toHaveBeenCalledWith("[info] Formatted message sent to #general");
  });

  it("returns false on a platform error", async () => {
    const sender = new SlackSender(fakePoster(platformError("channel_not_found")), "#general");

    await expect(sender.send({ text: "hi" }, "#nowhere")).resolves.toBe(false);
    expect(console.error).toHaveBeenCalledWith(
      "[err] Channel #nowhere not found or bot doesn't have access",
    );
  });

  it("rethrows other failures", async () => {
    const boom = new Error("socket hang up");
    const sender = new SlackSender(fakePoster(boom), "#general");

    await expect(sender.send({ text: "hi" })).rejects.toBe(boom);
  });
});
