import { existsSync } from "fs";
import { homedir } from "os";
import { join } from "path";
import dotenv from "dotenv";

/**
 * Local .env wins; ~/.env fills in a missing token for global installs.
 * dotenv never overrides a variable that is already set.
 */
export function loadEnvWithFallback(cwd = process.cwd(), home = homedir()) {
  const localEnv = join(cwd, ".env");
  if (existsSync(localEnv)) dotenv.config({ path: localEnv });

  if (!process.env.SLACK_BOT_TOKEN) {
    const homeEnv = join(home, ".env");
    if (existsSync(homeEnv)) dotenv.config({ path: homeEnv });
  }

  if (!process.env.SLACK_BOT_TOKEN) dotenv.config();
}

loadEnvWithFallback();

export const SLACK_BOT_TOKEN = process.env.SLACK_BOT_TOKEN ?? "";
export const SLACK_CHANNEL = process.env.SLACK_CHANNEL ?? "#general";
