import { promises as fs } from "fs";
import path from "path";
import { DownloadStreamError } from "../core/errors.js";
import { errorMessage } from "../core/json.js";
import type { ContactInfo, FetchLike } from "../entrez/types.js";

export type ProbeResult =
  | { ok: true; url: string; contentLength: number; response: Response }
  | { ok: false; url: string; reason: string };

export interface SavedDownload {
  url: string;
  destPath: string;
  bytes: number;
  declaredBytes: number;
}

export type ProgressFn = (received: number, declared: number) => Promise<void>;

const PROGRESS_STEP_BYTES = 16 * 1024 * 1024;

/**
 * Bounds the wait for response headers only. Once `fetch` resolves the timer is
 * cleared, so a slow but live body is never cut off.
 */
export async function fetchWithHeaderTimeout(
  fetchImpl: FetchLike,
  url: string,
  init: RequestInit,
  timeoutMs: number
): Promise<Response> {
  if (timeoutMs <= 0) return fetchImpl(url, init);
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(new Error(`no response from ${url} within ${timeoutMs} ms`)), timeoutMs);
  try {
    return await fetchImpl(url, { ...init, signal: controller.signal });
  } finally {
    clearTimeout(timer);
  }
}

export function parseContentLength(header: string | null): number | null {
  if (header === null) return null;
  const trimmed = header.trim();
  if (!/^\d+$/.test(trimmed)) return null;
  const n = Number(trimmed);
  return Number.isSafeInteger(n) ? n : null;
}

/**
 * Plain HTTP GET downloads. A probe opens the response and succeeds only when
 * the server declares a usable content-length; the same response is then
 * streamed to disk.
 */
export class HttpDownloader {
  private readonly fetchImpl: FetchLike;

  constructor(
    private readonly opts: {
      contact: ContactInfo;
      timeoutSeconds: number;
      fetch?: FetchLike;
    }
  ) {
    this.fetchImpl = opts.fetch ?? ((input, init) => fetch(input, init));
  }

  private async get(url: string): Promise<Response> {
    const init: RequestInit = {
      method: "GET",
      headers: {
        "accept-encoding": "identity",
        from: this.opts.contact.email,
        "user-agent": `${this.opts.contact.tool} (${this.opts.contact.email})`
      }
    };
    return fetchWithHeaderTimeout(this.fetchImpl, url, init, this.opts.timeoutSeconds * 1000);
  }

  async probe(url: string): Promise<ProbeResult> {
    let response: Response;
    try {
      response = await this.get(url);
    } catch (err) {
      return { ok: false, url, reason: errorMessage(err) };
    }
    if (!response.ok) {
      await response.body?.cancel();
      return { ok: false, url, reason: `HTTP ${response.status}` };
    }
    const contentLength = parseContentLength(response.headers.get("content-length"));
    if (contentLength === null) {
      await response.body?.cancel();
      return { ok: false, url, reason: "no valid content-length" };
    }
    return { ok: true, url, contentLength, response };
  }

  /** Streams a probed response to `destPath`; any failure, or a byte count that disagrees with the declared length, is fatal. */
  async save(probe: Extract<ProbeResult, { ok: true }>, destPath: string, onProgress?: ProgressFn): Promise<SavedDownload> {
    const body = probe.response.body;
    if (!body) throw new DownloadStreamError(probe.url, destPath, "response has no body");

    await fs.mkdir(path.dirname(destPath), { recursive: true });
    let received = 0;
    let nextReport = PROGRESS_STEP_BYTES;
    try {
      const fh = await fs.open(destPath, "w");
      try {
        const reader = body.getReader();
        for (;;) {
          const { done, value } = await reader.read();
          if (done) break;
          await fh.write(value);
          received += value.byteLength;
          if (onProgress && received >= nextReport) {
            nextReport += PROGRESS_STEP_BYTES;
            await onProgress(received, probe.contentLength);
          }
        }
      } finally {
        await fh.close();
      }
    } catch (err) {
      throw new DownloadStreamError(probe.url, destPath, errorMessage(err));
    }

    if (received !== probe.contentLength) {
      throw new DownloadStreamError(
        probe.url,
        destPath,
        `received ${received} bytes, server declared ${probe.contentLength}`
      );
    }
    if (onProgress) await onProgress(received, probe.contentLength);
    return { url: probe.url, destPath, bytes: received, declaredBytes: probe.contentLength };
  }
}
