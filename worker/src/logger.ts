/**
 * Panel Logging Utilities
 *
 * Every entry goes to the console. Entries also land in a bounded buffer that
 * the control panel shows as its log view, except for messages on the ignore
 * list, which only reach the buffer in DEV_MODE.
 */

import { DEV_MODE } from "./config";

export const MAX_LOG_ENTRIES = 100;
export const IGNORED_LOG_MESSAGES = ["Saved image"];

export interface SystemLogOptions {
  devMode?: boolean;
  maxEntries?: number;
  ignored?: readonly string[];
  now?: () => Date;
}

function timestamp(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  return `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

export class SystemLog {
  private readonly entries: string[] = [];
  private readonly devMode: boolean;
  private readonly maxEntries: number;
  private readonly ignored: readonly string[];
  private readonly now: () => Date;

  constructor(options: SystemLogOptions = {}) {
    this.devMode = options.devMode ?? DEV_MODE;
    this.maxEntries = options.maxEntries ?? MAX_LOG_ENTRIES;
    this.ignored = options.ignored ?? IGNORED_LOG_MESSAGES;
    this.now = options.now ?? (() => new Date());
  }

  add(message: string): string {
    const entry = `[${timestamp(this.now())}] ${message}`;
    console.log(entry);

    const isIgnored = this.ignored.some((fragment) => message.includes(fragment));
    if (this.devMode || !isIgnored) {
      this.entries.push(entry);
      if (this.entries.length > this.maxEntries) this.entries.shift();
    }
    return entry;
  }

  text(): string {
    return this.entries.join("\n");
  }

  get size(): number {
    return this.entries.length;
  }
}

/** Tagged console log for diagnostics that do not belong in the panel view. */
export function nLog(tag: string, ...args: unknown[]) {
  console.log(`[${tag}]`, ...args);
}
