import type { Config } from "../config";
import type { DocumentFetcher, PlayerSearchResult, RecordSet } from "../types";
import { createDocumentFetcher } from "./fetch";
import { fetchGameLogs } from "./gameLogs";
import { fetchPlayerSeasonTable } from "./players";
import { searchPlayers } from "./search";
import { detectLatestSeason } from "./seasons";

export class StatsScraper {
  private readonly fetchDocument: DocumentFetcher;
  readonly baseUrl: string;

  constructor(fetchDocument: DocumentFetcher, baseUrl: string) {
    this.fetchDocument = fetchDocument;
    this.baseUrl = baseUrl;
  }

  async detectLatestSeason(): Promise<number> {
    return detectLatestSeason(this.fetchDocument);
  }

  async fetchPlayerSeasonTable(season: number): Promise<RecordSet> {
    return fetchPlayerSeasonTable(this.fetchDocument, season);
  }

  async fetchGameLogs(playerId: string, season: number, lastN?: number): Promise<RecordSet> {
    return fetchGameLogs(this.fetchDocument, playerId, season, lastN);
  }

  async searchPlayers(query: string): Promise<PlayerSearchResult[]> {
    return searchPlayers(this.fetchDocument, query, this.baseUrl);
  }
}

export function createScraper(settings: Pick<Config, "baseUrl" | "userAgent" | "requestTimeoutMs">): StatsScraper {
  const fetchDocument = createDocumentFetcher({
    baseUrl: settings.baseUrl,
    userAgent: settings.userAgent,
    timeoutMs: settings.requestTimeoutMs,
  });
  return new StatsScraper(fetchDocument, settings.baseUrl);
}
