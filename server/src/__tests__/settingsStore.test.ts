import fs from "fs";
import os from "os";
import path from "path";

import {
  JsonSettingsStore,
  cleanSettings,
  mergeSettings,
  splitLegacyUrl,
} from "../services/settingsStore";
import { InvalidRequestError } from "@sketch-refine/worker";

const defaults = { sdHost: "http://127.0.0.1", sdPort: "7860", outputDir: "/pictures/out" };

describe("settings", () => {
  it("splits a legacy URL only when it carries a port", () => {
    expect(splitLegacyUrl("http://127.0.0.1:7860")).toEqual({ sdHost: "http://127.0.0.1", sdPort: "7860" });
    expect(splitLegacyUrl("http://localhost")).toBeNull();
  });

  it("migrates a legacy sdUrl", () => {
    expect(mergeSettings({ sdUrl: "http://10.0.0.2:7861" }, defaults)).toEqual({
      sdHost: "http://10.0.0.2",
      sdPort: "7861",
      outputDir: "/pictures/out",
    });
  });

  it("prefers sdHost over a legacy sdUrl", () => {
    const merged = mergeSettings({ sdUrl: "http://10.0.0.2:7861", sdHost: "http://10.0.0.3" }, defaults);
    expect(merged.sdHost).toBe("http://10.0.0.3");
    expect(merged.sdPort).toBe("7860");
  });

  it("uses the default output folder for a blank one", () => {
    expect(mergeSettings({ outputDir: "  ", sdPort: 7870 }, defaults)).toEqual({
      sdHost: "http://127.0.0.1",
      sdPort: "7870",
      outputDir: "/pictures/out",
    });
    expect(mergeSettings(["not", "settings"], defaults)).toEqual(defaults);
  });

  it("cleans user input", () => {
    expect(cleanSettings({ sdHost: " http://192.168.0.5/ ", sdPort: " 7861 " }, defaults)).toEqual({
      sdHost: "http://192.168.0.5",
      sdPort: "7861",
      outputDir: "/pictures/out",
    });
    expect(() => cleanSettings({ sdPort: "abc" }, defaults)).toThrow(InvalidRequestError);
    expect(() => cleanSettings({ sdHost: "127.0.0.1" }, defaults)).toThrow("sdHost must look like http://127.0.0.1");
  });

  describe("JsonSettingsStore", () => {
    let tmp: string;

    beforeEach(async () => {
      tmp = await fs.promises.mkdtemp(path.join(os.tmpdir(), "sketch-refine-settings-"));
    });

    afterEach(async () => {
      await fs.promises.rm(tmp, { recursive: true, force: true });
    });

    it("falls back to defaults without a file", () => {
      const store = new JsonSettingsStore(path.join(tmp, "missing.json"), () => defaults);
      expect(store.load()).toEqual(defaults);
    });

    it("reads back what it saved", () => {
      const file = path.join(tmp, "nested", "settings.json");
      const store = new JsonSettingsStore(file, () => defaults);
      const saved = { sdHost: "http://10.0.0.9", sdPort: "9000", outputDir: "/elsewhere" };

      store.save(saved);

      expect(store.load()).toEqual(saved);
      expect(JSON.parse(fs.readFileSync(file, "utf8"))).toEqual(saved);
    });

    it("warns and uses defaults for an unreadable file", () => {
      const file = path.join(tmp, "broken.json");
      fs.writeFileSync(file, "{ not json", "utf8");
      const warn = jest.fn();

      const store = new JsonSettingsStore(file, () => defaults, warn);

      expect(store.load()).toEqual(defaults);
      expect(warn).toHaveBeenCalledTimes(1);
      expect(warn.mock.calls[0][0]).toMatch(/^⚠️ Failed to read settings file: /);
    });
  });
});
