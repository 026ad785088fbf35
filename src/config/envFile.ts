import fs from "node:fs";
import path from "node:path";

import dotenv from "dotenv";

/**
 * Where the CLI looks for its `.env` file holding `OPENAI_API_KEY` and the
 * `MODELKIT_*` settings: `DOTENV_CONFIG_PATH` alone when set, otherwise the
 * working directory, then its parent.
 */
export function envFileCandidates(env: NodeJS.ProcessEnv, cwd: string): string[] {
  const explicitPath = env.DOTENV_CONFIG_PATH?.trim();
  if (explicitPath) {
    return [path.resolve(cwd, explicitPath)];
  }
  return [path.join(cwd, ".env"), path.join(cwd, "..", ".env")];
}

/**
 * Loads the first existing candidate into `env`. Variables already set win
 * over the file. Returns the file used, if any.
 */
export function loadEnvFile(
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd()
): string | undefined {
  const found = envFileCandidates(env, cwd).find((candidate) => fs.existsSync(candidate));
  if (!found) {
    return undefined;
  }
  const parsed = dotenv.parse(fs.readFileSync(found));
  for (const [key, value] of Object.entries(parsed)) {
    if (env[key] === undefined) {
      env[key] = value;
    }
  }
  return found;
}
