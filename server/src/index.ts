import {
  BatchState,
  POLL_INTERVAL_MS,
  ProgressPoller,
  SD_API_TIMEOUT_MS,
  SD_MODEL_KEYWORD,
  SD_PROBE_TIMEOUT_MS,
  SD_STATUS_TIMEOUT_MS,
  SdClient,
  SystemLog,
  errorMessage,
  loadProgressThresholds,
  sdBaseUrl,
} from "@sketch-refine/worker";

import { PORT, SETTINGS_PATH } from "./config";
import { createApp } from "./app";
import { ControlPanel } from "./services/panel";
import { JsonSettingsStore } from "./services/settingsStore";

async function main() {
  const log = new SystemLog();
  const state = new BatchState();
  const api = new SdClient({
    baseUrl: sdBaseUrl(),
    apiTimeoutMs: SD_API_TIMEOUT_MS,
    probeTimeoutMs: SD_PROBE_TIMEOUT_MS,
    statusTimeoutMs: SD_STATUS_TIMEOUT_MS,
  });
  const poller = new ProgressPoller({
    state,
    api,
    log,
    intervalMs: POLL_INTERVAL_MS,
    thresholds: loadProgressThresholds(),
  });
  const panel = new ControlPanel({
    api,
    state,
    log,
    poller,
    settingsStore: new JsonSettingsStore(SETTINGS_PATH, undefined, (m) => log.add(m)),
    modelKeyword: SD_MODEL_KEYWORD,
  });

  const app = createApp(panel);
  const server = app.listen(PORT, () => {
    log.add(`Control panel listening on :${PORT} (SD server ${api.baseUrl})`);
  });
  poller.start();

  const shutdown = () => {
    poller.stop();
    server.close();
    api.close();
  };
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

main().catch((err) => {
  console.error("[server] failed to start", errorMessage(err));
  process.exit(1);
});
