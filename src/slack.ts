import { ErrorCode, WebClient } from "@slack/web-api";
import type { OutgoingMessage } from "./message.js";
import { log } from "./utils/log.js";

export interface PostMessageArgs extends OutgoingMessage {
  channel: string;
  mrkdwn: boolean;
}

/** The one Web API call this tool makes. */
export interface MessagePoster {
  postMessage(args: PostMessageArgs): Promise<unknown>;
}

export function webClientPoster(token: string): MessagePoster {
  const client = new WebClient(token);
  return {
    postMessage: ({ channel, text, blocks, mrkdwn }) =>
      client.chat.postMessage({ channel, text, blocks, mrkdwn }),
  };
}

interface PlatformError {
  code: ErrorCode.PlatformError;
  data: { error: string };
}

function isPlatformError(e: unknown): e is PlatformError {
  if (typeof e !== "object" || e === null) return false;
  if (!("code" in e) || e.code !== ErrorCode.PlatformError) return false;
  if (!("data" in e) || typeof e.data !== "object" || e.data === null) return false;
  return "error" in e.data && typeof e.data.error === "string";
}

/** Log lines for a Slack error code, most specific first. */
export function describeSlackError(code: string, channel: string, what = "message"): string[] {
  switch (code) {
    case "missing_scope":
      return [
        `Error sending ${what}: ${code}`,
        "Your token needs 'chat:write' scope to send messages",
      ];
    case "channel_not_found":
      return [`Channel ${channel} not found or bot doesn't have access`];
    case "not_in_channel":
      return [
        `Bot is not a member of ${channel}`,
        "Add the bot to the channel first: /invite @<bot-name>",
      ];
    default:
      return [`Error sending ${what}: ${code}`];
  }
}

export class SlackSender {
  constructor(
    private readonly poster: MessagePoster,
    private readonly defaultChannel: string,
  ) {}

  /**
   * Post a message. Resolves false when Slack rejects it; transport and
   * other unexpected errors reject.
   */
  async send(message: OutgoingMessage, channel?: string): Promise<boolean> {
    const target = channel || this.defaultChannel;
    const what = message.blocks ? "formatted message" : "message";

    try {
      await this.poster.postMessage({ ...message, channel: target, mrkdwn: true });
    } catch (e) {
      if (!isPlatformError(e)) throw e;
      describeSlackError(e.data.error, target, what).forEach((line, i) =>
        i === 0 ? log.err(line) : log.info(line),
      );
      return false;
    }

    log.info(`${what === "message" ? "Message" : "Formatted message"} sent to ${target}`);
    return true;
  }
}
