import type { SdApi } from "./client";
import type { SystemLog } from "../logger";
import { ModelNotFoundError, errorMessage } from "../errors";

/**
 * Make sure the server's active checkpoint matches `keyword`, switching to
 * the first listed model whose title or name contains it.
 *
 * Returns the title now active, or null when the server could not be asked
 * (the batch then runs on whatever model is loaded). A missing model is fatal.
 */
export async function ensureModel(api: SdApi, keyword: string, log: SystemLog): Promise<string | null> {
  try {
    const options = await api.getOptions();
    const current = options.sd_model_checkpoint ?? "";
    if (current.includes(keyword)) return current;

    const models = await api.listModels();
    const target = models.find((m) => m.title.includes(keyword) || m.model_name.includes(keyword));
    if (!target) {
      const err = new ModelNotFoundError(keyword);
      log.add(`❌ ${err.message}`);
      throw err;
    }

    await api.setOptions({ sd_model_checkpoint: target.title });
    log.add(`Switched model: ${target.title}`);
    return target.title;
  } catch (err) {
    if (err instanceof ModelNotFoundError) throw err;
    console.warn("[models] could not resolve active model, continuing", errorMessage(err));
    return null;
  }
}
