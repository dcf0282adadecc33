import axios from "axios";
import { NetworkError, PageNotFoundError } from "../errors";
import type { DocumentFetcher } from "../types";
import { toAbsoluteUrl } from "../urls";
import { logger } from "../utils/logger";

export interface FetcherOptions {
  baseUrl: string;
  userAgent: string;
  timeoutMs: number;
}

function charsetOf(contentType: string): string {
  const match = /charset\s*=\s*"?([^";\s]+)"?/i.exec(contentType);
  return match ? match[1].toLowerCase() : "utf-8";
}

export function decodeBody(body: ArrayBuffer | Uint8Array, contentType = ""): string {
  const charset = charsetOf(contentType);
  try {
    return new TextDecoder(charset).decode(body);
  } catch (error) {
    if (!(error instanceof RangeError)) throw error;
    logger.debug(`Unknown charset '${charset}', decoding as utf-8`);
    return new TextDecoder("utf-8").decode(body);
  }
}

/**
 * Fetcher bound to one site. Every request carries the same User-Agent and
 * timeout; paths are resolved against `baseUrl`.
 */
export function createDocumentFetcher(options: FetcherOptions): DocumentFetcher {
  return async (path: string) => {
    const url = toAbsoluteUrl(options.baseUrl, path);
    logger.debug(`GET ${url}`);

    try {
      const response = await axios.get<ArrayBuffer>(url, {
        headers: { "User-Agent": options.userAgent },
        timeout: options.timeoutMs,
        responseType: "arraybuffer",
      });
      const contentType = response.headers["content-type"];
      return decodeBody(response.data, contentType ? String(contentType) : "");
    } catch (error) {
      if (axios.isAxiosError(error)) {
        if (error.response?.status === 404) {
          throw new PageNotFoundError(url, error);
        }
        throw new NetworkError(`Request to ${url} failed: ${error.message}`, url, error);
      }
      throw error;
    }
  };
}
