import fs from "node:fs/promises";
import path from "node:path";
import { env } from "@xenova/transformers";

/**
 * Point @xenova/transformers at an on-disk model cache before any pipeline is created,
 * so the sentence encoder is downloaded once and reused across restarts.
 *
 * @param cacheDir `TRANSFORMERS_CACHE`; defaults to `.cache/transformers` under the cwd.
 * @returns The directory in use.
 */
export async function configureTransformersCache(cacheDir?: string): Promise<string> {
  const dir = cacheDir?.trim() || path.resolve(process.cwd(), ".cache/transformers");
  await fs.mkdir(dir, { recursive: true });
  env.useBrowserCache = false;
  env.allowLocalModels = true;
  env.cacheDir = dir;
  console.error(`[FAQ] Model cache: ${dir}`);
  return dir;
}
