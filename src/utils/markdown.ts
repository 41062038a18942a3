import { reflowTables } from "./table.js";

// Slack's mrkdwn marks bold with a single asterisk.
export function rewriteBold(text: string) {
  return text.replace(/\*\*(.*?)\*\*/g, "*$1*");
}

/** Translate standard Markdown into the subset Slack renders. */
export function toSlackMd(text: string) {
  return reflowTables(rewriteBold(text));
}
