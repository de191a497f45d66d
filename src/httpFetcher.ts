import { AppConfig, getConfig } from "./config";
import { HttpStatusError } from "./errors";
import { logger } from "./logger";
import { DocumentFetcher, OutageType } from "./types";

export type HttpFetcherOptions = Pick<
  AppConfig,
  "baseUrl" | "requestTimeoutMs" | "userAgent"
>;

export function buildPageUrl(
  baseUrl: string,
  region: string,
  outageType: OutageType
): string {
  const url = new URL(baseUrl);
  url.search = new URLSearchParams({
    page: outageType,
    oddzial: region,
  }).toString();
  return url.toString();
}

async function fetchWithTimeout(
  url: string,
  timeoutMs: number,
  init: RequestInit
): Promise<Response> {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), timeoutMs);
  try {
    return await fetch(url, { ...init, signal: controller.signal });
  } finally {
    clearTimeout(timer);
  }
}

/** One GET per call. Transport failures propagate as fetch raised them. */
export class HttpDocumentFetcher implements DocumentFetcher {
  private readonly options: HttpFetcherOptions;

  constructor(options?: HttpFetcherOptions) {
    this.options = options ?? getConfig();
  }

  async fetchDocument(region: string, outageType: OutageType): Promise<string> {
    const url = buildPageUrl(this.options.baseUrl, region, outageType);
    logger.debug(`GET ${url}`);

    const response = await fetchWithTimeout(url, this.options.requestTimeoutMs, {
      method: "GET",
      headers: { "User-Agent": this.options.userAgent },
    });

    if (!response.ok) {
      throw new HttpStatusError(response.status, response.statusText, url);
    }

    const html = await response.text();
    logger.info(`Fetched HTML (${html.length} chars) for ${region}`);
    return html;
  }
}
