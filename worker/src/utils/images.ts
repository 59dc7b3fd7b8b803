import fs from "fs";
import path from "path";
import sharp from "sharp";
import extractChunks from "png-chunks-extract";
import encodeChunks from "png-chunks-encode";
import * as pngText from "png-chunk-text";
import { v4 as uuidv4 } from "uuid";

import { InvalidRequestError } from "../errors";

export const MAX_SOURCE_SIZE = 2048;
export const SIZE_MULTIPLE = 8;

export interface PreparedSource {
  base64: string; // PNG, no data-URL prefix
  width: number;
  height: number;
}

/**
 * Load a source image for img2img: RGB, long side at most `maxSize`, both
 * sides floored to a multiple of 8. Only resampled when that changes the size.
 */
export async function resizeForSd(inputPath: string, maxSize: number = MAX_SOURCE_SIZE): Promise<PreparedSource> {
  const meta = await sharp(inputPath).metadata();
  const w = meta.width ?? 0;
  const h = meta.height ?? 0;

  const scale = Math.max(w, h) > maxSize ? maxSize / Math.max(w, h) : 1;
  let width = Math.floor(w * scale);
  let height = Math.floor(h * scale);
  width -= width % SIZE_MULTIPLE;
  height -= height % SIZE_MULTIPLE;

  if (width < SIZE_MULTIPLE || height < SIZE_MULTIPLE) {
    throw new InvalidRequestError(`source image too small (${w}x${h})`);
  }

  let pipeline = sharp(inputPath).removeAlpha().toColourspace("srgb");
  if (scale !== 1 || w % SIZE_MULTIPLE !== 0 || h % SIZE_MULTIPLE !== 0) {
    pipeline = pipeline.resize(width, height, { fit: "fill", kernel: sharp.kernel.lanczos3 });
  }
  const buf = await pipeline.png().toBuffer();
  return { base64: buf.toString("base64"), width, height };
}

export function decodeBase64Image(b64: string): Buffer {
  const comma = b64.indexOf(",");
  const payload = b64.startsWith("data:") && comma >= 0 ? b64.slice(comma + 1) : b64;
  return Buffer.from(payload, "base64");
}

export function toPngDataUrl(buf: Buffer): string {
  return `data:image/png;base64,${buf.toString("base64")}`;
}

/** First infotext of a generation response's `info` JSON, or "". */
export function parseInfotext(info: string): string {
  try {
    const parsed: unknown = JSON.parse(info || "{}");
    if (typeof parsed !== "object" || parsed === null || !("infotexts" in parsed)) return "";
    const texts = parsed.infotexts;
    return Array.isArray(texts) && typeof texts[0] === "string" ? texts[0] : "";
  } catch {
    return "";
  }
}

export function dayFolderName(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

/** PNG text keyword the WebUI's "PNG Info" reads generation settings from. */
export const PNG_PARAMETERS_KEY = "parameters";

/** Insert a `tEXt` chunk ahead of the image data. */
export function withPngText(png: Buffer, keyword: string, text: string): Buffer {
  const chunks = extractChunks(png);
  const firstData = chunks.findIndex((chunk) => chunk.name === "IDAT");
  chunks.splice(firstData < 0 ? chunks.length - 1 : firstData, 0, pngText.encode(keyword, text));
  return Buffer.from(encodeChunks(chunks));
}

/** The `tEXt` value stored under `keyword`, or null. */
export function readPngText(png: Buffer, keyword: string): string | null {
  for (const chunk of extractChunks(png)) {
    if (chunk.name !== "tEXt") continue;
    const entry = pngText.decode(chunk.data);
    if (entry.keyword === keyword) return entry.text;
  }
  return null;
}

/**
 * Write a generated image under `<outputDir>/<YYYY-MM-DD>/`, carrying its
 * generation parameters in a `parameters` text chunk.
 */
export async function saveGeneratedImage(
  outputDir: string,
  bytes: Buffer,
  parameters: string,
  now: Date = new Date()
): Promise<string> {
  const dir = path.join(outputDir, dayFolderName(now));
  await fs.promises.mkdir(dir, { recursive: true });

  const fileName = `gen_${Math.floor(now.getTime() / 1000)}_${uuidv4()}.png`;
  const fullPath = path.join(dir, fileName);

  const png = await sharp(bytes).png().toBuffer();
  await fs.promises.writeFile(fullPath, parameters ? withPngText(png, PNG_PARAMETERS_KEY, parameters) : png);
  return fullPath;
}
