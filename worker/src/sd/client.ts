import http from "http";
import https from "https";
import fetch, { type RequestInit } from "node-fetch";

import type {
  Img2ImgPayload,
  Img2ImgResponse,
  SdModel,
  SdOptions,
  SdProgressResponse,
} from "@sketch-refine/shared";
import { CapabilityError, SdHttpError } from "../errors";

/** Body fragment the WebUI returns (422) when the ADetailer extension is missing. */
export const REFINER_MISSING_MARKER = "Script 'ADetailer' not found";

/**
 * The narrow surface of the generation server the core depends on. Tests
 * substitute an in-memory implementation.
 */
export interface SdApi {
  readonly baseUrl: string;
  probe(): Promise<boolean>;
  getProgress(): Promise<SdProgressResponse>;
  img2img(payload: Img2ImgPayload): Promise<Img2ImgResponse>;
  interrupt(): Promise<void>;
  getOptions(): Promise<SdOptions>;
  setOptions(patch: SdOptions): Promise<void>;
  listModels(): Promise<SdModel[]>;
}

export interface SdClientOptions {
  baseUrl: string;
  apiTimeoutMs: number;
  probeTimeoutMs: number;
  statusTimeoutMs: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function optionalNumber(value: unknown): number | null {
  return typeof value === "number" && Number.isFinite(value) ? value : null;
}

export function parseProgressResponse(json: unknown): SdProgressResponse {
  if (!isRecord(json)) return {};
  const state = isRecord(json.state) ? json.state : null;
  return {
    progress: optionalNumber(json.progress),
    state: state
      ? { job_count: optionalNumber(state.job_count), job_no: optionalNumber(state.job_no) }
      : null,
  };
}

export function parseImg2ImgResponse(json: unknown): Img2ImgResponse {
  if (!isRecord(json)) return { images: [], info: "{}" };
  const images = Array.isArray(json.images)
    ? json.images.filter((img): img is string => typeof img === "string")
    : [];
  const info = typeof json.info === "string" ? json.info : "{}";
  return { images, info };
}

export function parseModelList(json: unknown): SdModel[] {
  if (!Array.isArray(json)) return [];
  return json.filter(isRecord).map((m) => ({
    title: typeof m.title === "string" ? m.title : "",
    model_name: typeof m.model_name === "string" ? m.model_name : "",
  }));
}

/**
 * HTTP client for the WebUI API. Requests share keep-alive agents, so the
 * poller reuses one connection instead of opening a socket per tick; every
 * response body is read to the end to hand the socket back.
 */
export class SdClient implements SdApi {
  private url: string;
  private readonly opts: SdClientOptions;
  private readonly httpAgent = new http.Agent({ keepAlive: true });
  private readonly httpsAgent = new https.Agent({ keepAlive: true });

  constructor(opts: SdClientOptions) {
    this.opts = opts;
    this.url = opts.baseUrl;
  }

  get baseUrl(): string {
    return this.url;
  }

  /** Points subsequent requests at another server (settings were saved). */
  setBaseUrl(baseUrl: string) {
    this.url = baseUrl;
  }

  /** Drops pooled connections; the client can still be used afterwards. */
  close() {
    this.httpAgent.destroy();
    this.httpsAgent.destroy();
  }

  private request(route: string, init: RequestInit = {}) {
    return fetch(`${this.url}${route}`, {
      ...init,
      agent: (parsed) => (parsed.protocol === "https:" ? this.httpsAgent : this.httpAgent),
    });
  }

  private async getJson(route: string, timeout: number): Promise<unknown> {
    const res = await this.request(route, { timeout });
    if (!res.ok) throw new SdHttpError(res.status, await res.text());
    return res.json();
  }

  private async postJson(route: string, body: unknown, timeout: number) {
    return this.request(route, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(body),
      timeout,
    });
  }

  async probe(): Promise<boolean> {
    try {
      const res = await this.request("/sdapi/v1/progress", { timeout: this.opts.probeTimeoutMs });
      await res.text();
      return res.status === 200;
    } catch {
      return false;
    }
  }

  async getProgress(): Promise<SdProgressResponse> {
    const json = await this.getJson("/sdapi/v1/progress", this.opts.statusTimeoutMs);
    return parseProgressResponse(json);
  }

  async img2img(payload: Img2ImgPayload): Promise<Img2ImgResponse> {
    const res = await this.postJson("/sdapi/v1/img2img", payload, this.opts.apiTimeoutMs);

    if (res.status === 200) {
      return parseImg2ImgResponse(await res.json());
    }

    const body = await res.text();
    if (res.status === 422 && body.includes(REFINER_MISSING_MARKER)) {
      throw new CapabilityError();
    }
    throw new SdHttpError(res.status, body);
  }

  async interrupt(): Promise<void> {
    const res = await this.request("/sdapi/v1/interrupt", { method: "POST", timeout: this.opts.probeTimeoutMs });
    const body = await res.text();
    if (!res.ok) throw new SdHttpError(res.status, body);
  }

  async getOptions(): Promise<SdOptions> {
    const json = await this.getJson("/sdapi/v1/options", this.opts.apiTimeoutMs);
    if (!isRecord(json)) return {};
    const checkpoint = json.sd_model_checkpoint;
    return typeof checkpoint === "string" ? { sd_model_checkpoint: checkpoint } : {};
  }

  async setOptions(patch: SdOptions): Promise<void> {
    const res = await this.postJson("/sdapi/v1/options", patch, this.opts.apiTimeoutMs);
    const body = await res.text();
    if (!res.ok) throw new SdHttpError(res.status, body);
  }

  async listModels(): Promise<SdModel[]> {
    const json = await this.getJson("/sdapi/v1/sd-models", this.opts.apiTimeoutMs);
    return parseModelList(json);
  }
}
