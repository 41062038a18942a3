import { parseArgs } from "util";
import { InputError, parseMessage, renderMessage } from "./message.js";
import type { Message } from "./message.js";
import type { SlackSender } from "./slack.js";
import { log } from "./utils/log.js";

export const USAGE = "Usage: echo 'message' | slack-pipe [destination] [--text-only]";

export interface CliOptions {
  destination?: string;
  textOnly: boolean;
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

function parseArgv(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      options: { "text-only": { type: "boolean", default: false } },
      allowPositionals: true,
      strict: true,
    });
  } catch (e) {
    throw new UsageError(e instanceof Error ? e.message : String(e));
  }
}

export function parseCli(argv: string[]): CliOptions {
  const { values, positionals } = parseArgv(argv);
  if (positionals.length > 1) {
    throw new UsageError(`Unexpected argument: ${positionals[1]}`);
  }
  return {
    destination: positionals[0],
    textOnly: values["text-only"] ?? false,
  };
}

/** Checks made before reading stdin. Returns an exit code to stop with. */
export function preflight(isTTY: boolean | undefined, token: string): number | undefined {
  if (isTTY) {
    log.err("No input provided. This command expects input via pipeline.");
    log.info(USAGE);
    return 1;
  }
  if (!token) {
    log.err("SLACK_BOT_TOKEN is not set (checked ./.env and ~/.env)");
    return 1;
  }
  return undefined;
}

/** Parse, translate and send one piped message. Returns the exit code. */
export async function deliver(
  raw: string,
  opts: CliOptions,
  sender: SlackSender,
): Promise<number> {
  let message: Message;
  try {
    message = parseMessage(raw, { textOnly: opts.textOnly });
  } catch (e) {
    if (!(e instanceof InputError)) throw e;
    log.err(e.message);
    return 1;
  }

  const sent = await sender.send(renderMessage(message), opts.destination);
  return sent ? 0 : 1;
}
