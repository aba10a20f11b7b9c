import { lookup } from "dns/promises";
import axios, { AxiosError } from "axios";
import IPAddr from "ipaddr.js";
import type { Logger } from "winston";
import { logger as _logger } from "../logger";
import { DocumentFetchError } from "../error";

export interface FetchedDocument {
  bytes: Buffer;
  mimeType?: string;
  finalUrl: string;
}

/** Resolves a host name to every address it points at. */
export type HostResolver = (hostname: string) => Promise<string[]>;

export interface FetchOptions {
  timeoutMs: number;
  maxBytes: number;
  maxRedirects?: number;
  /** Skip the private address check, for local development. */
  allowLocal?: boolean;
  headers?: Record<string, string>;
  resolveHost?: HostResolver;
}

const USER_AGENT =
  "Mozilla/5.0 (compatible; thread-rag/0.1; +https://github.com/)";

const DEFAULT_MAX_REDIRECTS = 5;

/**
 * Strip the trailing punctuation chat clients leave around links
 * (`<https://a.b/c>`, `https://a.b/c|label`, `https://a.b/c).`) and undo
 * Slack's escaping of `&`, `<` and `>`.
 */
export function cleanUrl(raw: string): string {
  let url = raw.trim().replace(/^<|>$/g, "");
  const pipe = url.indexOf("|");
  if (pipe !== -1) url = url.slice(0, pipe);
  return url
    .replace(/&lt;/g, "<")
    .replace(/&gt;/g, ">")
    .replace(/&amp;/g, "&")
    .replace(/[)\]}>.,;:!?'"*_]+$/, "");
}

export function extractUrls(text: string): string[] {
  const matches = text.match(/https?:\/\/[^\s<>]+/g) ?? [];
  const urls = matches.map(cleanUrl).filter(u => {
    try {
      new URL(u);
      return true;
    } catch {
      return false;
    }
  });
  return [...new Set(urls)];
}

/** Loopback, private, link-local and every other non-unicast range. */
export function isIPPrivate(address: string): boolean {
  if (!IPAddr.isValid(address)) return false;

  const addr = IPAddr.parse(address);
  return addr.range() !== "unicast";
}

const resolveWithDns: HostResolver = async hostname =>
  (await lookup(hostname, { all: true })).map(entry => entry.address);

/** Rejects URLs that are not http(s) or whose host resolves to a private address. */
export async function assertPublicUrl(
  url: string,
  resolveHost: HostResolver = resolveWithDns,
): Promise<void> {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    throw new DocumentFetchError(`Invalid URL: ${url}`);
  }

  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    throw new DocumentFetchError(
      `Refusing to fetch ${url}: unsupported scheme ${parsed.protocol}`,
    );
  }

  const host = parsed.hostname.replace(/^\[|\]$/g, "");
  const addresses = IPAddr.isValid(host) ? [host] : await resolveHost(host);

  if (addresses.length === 0 || addresses.some(isIPPrivate)) {
    throw new DocumentFetchError(
      `Refusing to fetch ${url}: it resolves to a private address`,
    );
  }
}

function hostOf(url: string): string {
  return new URL(url).host;
}

/**
 * Download a document over HTTP(S). One attempt, bounded by a timeout and a
 * size limit. Redirects are followed by hand so every hop gets the address
 * check; credentials are only sent to the host they were issued for.
 */
export async function fetchDocument(
  url: string,
  options: FetchOptions,
  logger?: Logger,
): Promise<FetchedDocument> {
  const log = logger ?? _logger.child({ module: "fetch-document" });
  const maxRedirects = options.maxRedirects ?? DEFAULT_MAX_REDIRECTS;

  let current = url;
  try {
    const originHost = hostOf(url);

    for (let redirects = 0; ; redirects++) {
      if (!options.allowLocal) {
        await assertPublicUrl(current, options.resolveHost);
      }

      const response = await axios.get<ArrayBuffer>(current, {
        responseType: "arraybuffer",
        timeout: options.timeoutMs,
        maxContentLength: options.maxBytes,
        maxRedirects: 0,
        validateStatus: status => status >= 200 && status < 400,
        headers: {
          "User-Agent": USER_AGENT,
          ...(hostOf(current) === originHost ? options.headers : {}),
        },
      });

      if (response.status >= 300) {
        const location = response.headers["location"];
        if (typeof location !== "string" || !location) {
          throw new DocumentFetchError(
            `Fetching ${current} redirected without a location`,
          );
        }
        if (redirects >= maxRedirects) {
          throw new DocumentFetchError(
            `Fetching ${url} exceeded ${maxRedirects} redirects`,
          );
        }
        current = new URL(location, current).toString();
        continue;
      }

      const contentType = response.headers["content-type"];

      log.debug("Fetched document", {
        url,
        finalUrl: current,
        status: response.status,
        contentType,
        bytes: response.data.byteLength,
      });

      return {
        bytes: Buffer.from(response.data),
        mimeType: typeof contentType === "string" ? contentType : undefined,
        finalUrl: current,
      };
    }
  } catch (error) {
    const status =
      error instanceof AxiosError ? error.response?.status : undefined;
    const message =
      error instanceof Error ? error.message : String(error);

    log.warn("Failed to fetch document", { url, status, error: message });

    if (error instanceof DocumentFetchError) throw error;

    throw new DocumentFetchError(
      status ? `Fetching ${url} failed with HTTP ${status}` : `Fetching ${url} failed: ${message}`,
      { cause: error },
    );
  }
}
