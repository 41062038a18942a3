#!/usr/bin/env node
import { SLACK_BOT_TOKEN, SLACK_CHANNEL } from "./config.js";
import { USAGE, UsageError, deliver, parseCli, preflight } from "./cli.js";
import type { CliOptions } from "./cli.js";
import { SlackSender, webClientPoster } from "./slack.js";
import { log } from "./utils/log.js";

async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString("utf-8");
}

async function main(): Promise<number> {
  let opts: CliOptions;
  try {
    opts = parseCli(process.argv.slice(2));
  } catch (e) {
    if (!(e instanceof UsageError)) throw e;
    log.err(e.message);
    log.info(USAGE);
    return 2;
  }

  const stop = preflight(process.stdin.isTTY, SLACK_BOT_TOKEN);
  if (stop !== undefined) return stop;

  const sender = new SlackSender(webClientPoster(SLACK_BOT_TOKEN), SLACK_CHANNEL);
  return deliver(await readStdin(), opts, sender);
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((e: unknown) => {
    log.err(`Unexpected failure: ${e instanceof Error ? e.message : String(e)}`);
    process.exitCode = 1;
  });
