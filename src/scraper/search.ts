import { load } from "cheerio";
import type { DocumentFetcher, PlayerSearchResult } from "../types";
import { buildPlayerSearchPath, PLAYER_PAGE_PATTERN, toAbsoluteUrl } from "../urls";
import { logger } from "../utils/logger";
import { normalizeText } from "../utils/normalize";
import { stripCommentDelimiters } from "./table";

function toResult(baseUrl: string, urlPath: string, name: string): PlayerSearchResult | null {
  const match = PLAYER_PAGE_PATTERN.exec(urlPath);
  if (!match) return null;
  return { id: match[1], name: normalizeText(name), url: toAbsoluteUrl(baseUrl, urlPath) };
}

export function parseSearchResults(html: string, baseUrl: string): PlayerSearchResult[] {
  const $ = load(stripCommentDelimiters(html));
  const results: PlayerSearchResult[] = [];

  $("div.search-item").each((_, item) => {
    const name = $(item).find(".search-item-name a").first().text();
    const urlPath =
      $(item).find(".search-item-url").first().text().trim() ||
      $(item).find("a[href]").first().attr("href")?.trim();
    if (!urlPath) return;

    const result = toResult(baseUrl, urlPath, name);
    if (result) results.push(result);
  });

  if (results.length) return results;

  // An exact match redirects straight to the player's page
  const canonical = $('link[rel="canonical"]').attr("href");
  if (canonical) {
    const result = toResult(baseUrl, new URL(canonical, `${baseUrl}/`).pathname, $("h1").first().text());
    if (result) return [result];
  }
  return [];
}

export async function searchPlayers(
  fetchDocument: DocumentFetcher,
  query: string,
  baseUrl: string
): Promise<PlayerSearchResult[]> {
  const html = await fetchDocument(buildPlayerSearchPath(query));
  const results = parseSearchResults(html, baseUrl);
  logger.debug(`Search '${query}' matched ${results.length} players`);
  return results;
}
