import { copyFile, utimes, writeFile } from "node:fs/promises";
import { basename } from "node:path";
import axios from "axios";
import chalk from "chalk";
import { FetchError, InstallerErrorCode, errorMessage } from "./errors.js";
import type { Source } from "./sources.js";

export interface HttpResponse {
  status: number;
  data: Buffer;
  location?: string;
  lastModified?: string;
}

/** Single request, no redirect following. Rejects only when no response arrived. */
export interface HttpTransport {
  get(url: string): Promise<HttpResponse>;
}

export class AxiosTransport implements HttpTransport {
  constructor(private readonly timeout = 30_000) {}

  async get(url: string): Promise<HttpResponse> {
    const response = await axios.get<ArrayBuffer>(url, {
      responseType: "arraybuffer",
      maxRedirects: 0,
      timeout: this.timeout,
      validateStatus: () => true,
    });
    const header = (name: string): string | undefined => {
      const value: unknown = response.headers[name];
      return typeof value === "string" ? value : undefined;
    };
    return {
      status: response.status,
      data: Buffer.from(response.data),
      location: header("location"),
      lastModified: header("last-modified"),
    };
  }
}

export interface FetchOptions {
  transport: HttpTransport;
  /** Retries after the first attempt. */
  retries?: number;
  /** No retry is scheduled once it would end past this many ms after the first attempt. */
  maxRetryTimeMs?: number;
  initialDelayMs?: number;
  maxRedirects?: number;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

export const DEFAULT_RETRIES = 10;
export const DEFAULT_MAX_RETRY_TIME_MS = 10_000;

const TRANSIENT_STATUS = new Set([408, 429, 500, 502, 503, 504]);
const REDIRECT_STATUS = new Set([301, 302, 303, 307, 308]);

const defaultSleep = (ms: number) =>
  new Promise<void>((resolve) => setTimeout(resolve, ms));

/** Fetch one artifact to `destination`, copying or downloading depending on the source. */
export async function fetchArtifact(
  source: Source,
  destination: string,
  opts: FetchOptions,
): Promise<void> {
  if (source.kind === "local") {
    try {
      await copyFile(source.path, destination);
    } catch (err: unknown) {
      throw new FetchError(
        InstallerErrorCode.IO,
        `Failed to copy ${source.path} to ${destination}: ${errorMessage(err)}`,
        { cause: err },
      );
    }
    return;
  }

  const response = await downloadWithRetry(source.url, opts);
  try {
    await writeFile(destination, response.data);
    const mtime = response.lastModified ? new Date(response.lastModified) : undefined;
    if (mtime && !Number.isNaN(mtime.getTime())) {
      await utimes(destination, mtime, mtime);
    }
  } catch (err: unknown) {
    throw new FetchError(
      InstallerErrorCode.IO,
      `Failed to write ${destination}: ${errorMessage(err)}`,
      { cause: err },
    );
  }
  console.log(chalk.dim(`Downloaded ${basename(source.url)}`));
}

type Attempt =
  | { done: true; response: HttpResponse }
  | { done: false; transient: boolean; reason: string };

async function attempt(url: string, opts: FetchOptions): Promise<Attempt> {
  let response: HttpResponse;
  try {
    response = await getFollowingRedirects(url, opts);
  } catch (err: unknown) {
    if (err instanceof FetchError) throw err;
    return { done: false, transient: true, reason: errorMessage(err) };
  }
  if (response.status >= 200 && response.status < 300) {
    return { done: true, response };
  }
  return {
    done: false,
    transient: TRANSIENT_STATUS.has(response.status),
    reason: `HTTP ${response.status}`,
  };
}

async function downloadWithRetry(
  url: string,
  opts: FetchOptions,
): Promise<HttpResponse> {
  const retries = opts.retries ?? DEFAULT_RETRIES;
  const budget = opts.maxRetryTimeMs ?? DEFAULT_MAX_RETRY_TIME_MS;
  const sleep = opts.sleep ?? defaultSleep;
  const now = opts.now ?? Date.now;
  const started = now();
  let delay = opts.initialDelayMs ?? 1_000;

  for (let attempts = 1; ; attempts++) {
    const result = await attempt(url, opts);
    if (result.done) return result.response;

    if (!result.transient) {
      throw new FetchError(
        InstallerErrorCode.NETWORK,
        `Failed to download ${url}: ${result.reason}`,
        { context: { url, attempts } },
      );
    }

    const exhausted =
      attempts > retries || now() - started + delay > budget;
    if (exhausted) {
      throw new FetchError(
        InstallerErrorCode.NETWORK,
        `Failed to download ${url} after ${attempts} attempts: ${result.reason}`,
        { context: { url, attempts } },
      );
    }

    await sleep(delay);
    delay *= 2;
  }
}

async function getFollowingRedirects(
  url: string,
  opts: FetchOptions,
): Promise<HttpResponse> {
  const maxRedirects = opts.maxRedirects ?? 10;
  let current = assertHttps(url, url);

  for (let hops = 0; ; hops++) {
    const response = await opts.transport.get(current.href);
    if (!REDIRECT_STATUS.has(response.status) || !response.location) {
      return response;
    }
    if (hops >= maxRedirects) {
      throw new FetchError(
        InstallerErrorCode.NETWORK,
        `Too many redirects fetching ${url}`,
        { context: { url, maxRedirects } },
      );
    }
    current = assertHttps(new URL(response.location, current).href, url);
  }
}

function assertHttps(target: string, requested: string): URL {
  let parsed: URL;
  try {
    parsed = new URL(target);
  } catch (err: unknown) {
    throw new FetchError(InstallerErrorCode.NETWORK, `Invalid URL: ${target}`, {
      cause: err,
    });
  }
  if (parsed.protocol !== "https:") {
    throw new FetchError(
      InstallerErrorCode.NETWORK,
      `Refusing non-HTTPS location ${parsed.href} while fetching ${requested}`,
      { context: { url: requested, location: parsed.href } },
    );
  }
  return parsed;
}
