import { z } from "zod";
import { toSlackMd } from "./utils/markdown.js";

export class InputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InputError";
  }
}

// Block contents are Slack's to validate
const blockSchema = z
  .object({ type: z.string(), block_id: z.string().optional() })
  .passthrough();

const blocksMessageSchema = z.object({
  blocks: z.array(blockSchema),
  text: z.string().optional(),
});

const textMessageSchema = z.object({
  text: z.string(),
});

export type SlackBlock = z.infer<typeof blockSchema>;

export type Message =
  | { kind: "markdown"; text: string }
  | { kind: "text"; text: string }
  | { kind: "blocks"; blocks: SlackBlock[]; text: string };

export interface OutgoingMessage {
  text: string;
  blocks?: SlackBlock[];
}

export interface ParseOptions {
  textOnly?: boolean;
}

function tryJson(raw: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(raw) };
  } catch {
    return { ok: false };
  }
}

/**
 * Classify piped input. JSON objects carry a ready-made Slack message;
 * anything that is not JSON is Markdown to translate.
 */
export function parseMessage(raw: string, opts: ParseOptions = {}): Message {
  const input = raw.trim();
  if (!input) throw new InputError("Empty input received");

  if (opts.textOnly) return { kind: "markdown", text: input };

  const parsed = tryJson(input);
  if (!parsed.ok) return { kind: "markdown", text: input };

  const data = parsed.value;
  if (typeof data !== "object" || data === null || Array.isArray(data)) {
    throw new InputError("Message data must be a dictionary");
  }

  if ("blocks" in data) {
    const res = blocksMessageSchema.safeParse(data);
    if (!res.success) throw new InputError("Invalid message structure");
    return { kind: "blocks", blocks: res.data.blocks, text: res.data.text ?? "" };
  }

  const res = textMessageSchema.safeParse(data);
  if (!res.success) throw new InputError("Invalid message structure");
  return { kind: "text", text: res.data.text };
}

export function renderMessage(message: Message): OutgoingMessage {
  switch (message.kind) {
    case "markdown":
      return { text: toSlackMd(message.text) };
    case "text":
      return { text: message.text };
    case "blocks":
      return { text: message.text, blocks: message.blocks };
  }
}
