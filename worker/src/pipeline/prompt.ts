import type { SystemLog } from "../logger";
import { errorMessage } from "../errors";

export const QUALITY_TAGS = "masterpiece, best quality";
export const NEGATIVE_TAGS = "bad quality, worst quality, worst detail";

/** Turns the user's free-text hint into prompt language. */
export interface HintTranslator {
  translate(text: string): Promise<string>;
}

export const passThroughTranslator: HintTranslator = {
  translate: async (text) => text,
};

export interface BuiltPrompt {
  prompt: string;
  negativePrompt: string;
}

export async function buildPrompt(
  hint: string,
  translator: HintTranslator,
  log: SystemLog
): Promise<BuiltPrompt> {
  const text = hint.trim();
  if (!text) return { prompt: QUALITY_TAGS, negativePrompt: NEGATIVE_TAGS };

  let translated = text;
  try {
    translated = (await translator.translate(text)).trim() || text;
    if (translated !== text) log.add(`Translated hint: ${text} -> ${translated}`);
  } catch (err) {
    log.add("Hint translation failed (using original text)");
    console.warn("[prompt] translator error", errorMessage(err));
  }

  return { prompt: `${translated}, ${QUALITY_TAGS}`, negativePrompt: NEGATIVE_TAGS };
}
