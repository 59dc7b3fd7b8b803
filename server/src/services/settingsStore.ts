import * as fs from "node:fs";
import * as path from "node:path";

import type { PanelSettings } from "@sketch-refine/shared";
import { InvalidRequestError, OUTPUT_DIR, SD_HOST, SD_PORT, errorMessage } from "@sketch-refine/worker";

export function defaultSettings(): PanelSettings {
  return { sdHost: SD_HOST, sdPort: SD_PORT, outputDir: OUTPUT_DIR };
}

/**
 * Older settings files stored a single `sdUrl` such as
 * `http://127.0.0.1:7860`. Only a URL with an explicit port is split.
 */
export function splitLegacyUrl(url: string): { sdHost: string; sdPort: string } | null {
  const parts = url.split(":");
  if (parts.length < 3) return null;
  return { sdHost: parts.slice(0, -1).join(":"), sdPort: parts[parts.length - 1] };
}

function stringField(raw: Record<string, unknown>, key: string): string | undefined {
  const value = raw[key];
  if (typeof value === "string") return value;
  if (typeof value === "number" && Number.isFinite(value)) return String(value);
  return undefined;
}

/** Merge a loaded file over the defaults; unknown keys are ignored. */
export function mergeSettings(raw: unknown, defaults: PanelSettings): PanelSettings {
  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) return { ...defaults };
  const record: Record<string, unknown> = { ...raw };

  const legacyUrl = stringField(record, "sdUrl");
  if (legacyUrl !== undefined && stringField(record, "sdHost") === undefined) {
    const split = splitLegacyUrl(legacyUrl);
    if (split) Object.assign(record, split);
  }

  const outputDir = stringField(record, "outputDir")?.trim();
  return {
    sdHost: stringField(record, "sdHost") ?? defaults.sdHost,
    sdPort: stringField(record, "sdPort") ?? defaults.sdPort,
    outputDir: outputDir || defaults.outputDir,
  };
}

/** Trim and check user-supplied settings before they are stored. */
export function cleanSettings(input: Partial<PanelSettings>, current: PanelSettings): PanelSettings {
  const sdHost = (input.sdHost ?? current.sdHost).trim().replace(/\/+$/, "");
  const sdPort = String(input.sdPort ?? current.sdPort).trim();
  const outputDir = (input.outputDir ?? current.outputDir).trim();

  if (!/^https?:\/\/[^\s/]+$/.test(sdHost)) {
    throw new InvalidRequestError("sdHost must look like http://127.0.0.1");
  }
  const port = Number(sdPort);
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new InvalidRequestError("sdPort must be a port number");
  }
  return { sdHost, sdPort, outputDir };
}

export interface SettingsStore {
  load(): PanelSettings;
  save(settings: PanelSettings): void;
}

export class JsonSettingsStore implements SettingsStore {
  constructor(
    private readonly filePath: string,
    private readonly defaults: () => PanelSettings = defaultSettings,
    private readonly warn: (message: string) => void = (m) => console.warn(`[settings] ${m}`)
  ) {}

  load(): PanelSettings {
    if (!fs.existsSync(this.filePath)) return this.defaults();
    try {
      const parsed: unknown = JSON.parse(fs.readFileSync(this.filePath, "utf8"));
      return mergeSettings(parsed, this.defaults());
    } catch (err) {
      this.warn(`⚠️ Failed to read settings file: ${errorMessage(err)}`);
      return this.defaults();
    }
  }

  save(settings: PanelSettings): void {
    fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
    fs.writeFileSync(this.filePath, JSON.stringify(settings, null, 2), "utf8");
  }
}
