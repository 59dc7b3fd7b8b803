import { resizeForSd, saveGeneratedImage, type PreparedSource } from "../utils/images";

/** Where batch inputs come from and outputs go. */
export interface ImageStore {
  prepareSource(sourcePath: string): Promise<PreparedSource>;
  save(bytes: Buffer, parameters: string): Promise<string>;
}

export function createFileImageStore(outputDir: () => string): ImageStore {
  return {
    prepareSource: (sourcePath) => resizeForSd(sourcePath),
    save: (bytes, parameters) => saveGeneratedImage(outputDir(), bytes, parameters),
  };
}
