import fs from "node:fs";
import type { AudioAsset, Logger, Result } from "../types.js";

/**
 * Acquire an audio file, hand it to `use`, and delete it exactly once
 * on every exit path. A failed delete is logged and never replaces the
 * result (or rejection) of `use`.
 */
export async function withAudioAsset<T, AE, UE>(
  acquire: () => Promise<Result<AudioAsset, AE>>,
  use: (asset: AudioAsset) => Promise<Result<T, UE>>,
  log: Logger
): Promise<Result<T, AE | UE>> {
  const acquired = await acquire();
  if (!acquired.ok) {
    return acquired;
  }

  const asset = acquired.value;
  try {
    return await use(asset);
  } finally {
    await releaseAudioAsset(asset, log);
  }
}

export async function releaseAudioAsset(asset: AudioAsset, log: Logger): Promise<void> {
  try {
    await fs.promises.rm(asset.localPath, { force: true });
    log.debug({ path: asset.localPath }, "Removed temporary audio file");
  } catch (error) {
    log.warn({ err: error, path: asset.localPath }, "Failed to remove temporary audio file");
  }
}
