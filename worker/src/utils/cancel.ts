import type { SdApi } from "../sd/client";
import type { SystemLog } from "../logger";
import type { BatchState } from "../progress/batchState";

/**
 * Stop control. Raises the cancel flag first, so the batch stops at the next
 * image boundary even if the interrupt request itself fails, then asks the
 * server to abort the job in flight.
 */
export async function interruptGeneration(api: SdApi, state: BatchState, log: SystemLog): Promise<void> {
  log.add("⚠️ Sending interrupt request...");
  state.requestCancel();
  await api.interrupt();
}
