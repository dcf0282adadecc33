import { z } from "zod";

const UrlPathsSchema = z.object({
  leaguesIndex: z.function(z.tuple([]), z.string()),
  perGameStats: z.function(z.tuple([z.number().int()]), z.string()),
  gameLog: z.function(z.tuple([z.string().min(1), z.number().int()]), z.string()),
  playerSearch: z.function(z.tuple([z.string()]), z.string()),
});

const urlPaths = UrlPathsSchema.parse({
  leaguesIndex: () => "/leagues/",
  perGameStats: (season: number) => `/leagues/NBA_${season}_per_game.html`,
  gameLog: (playerId: string, season: number) =>
    `/players/${playerId.charAt(0)}/${playerId}/gamelog/${season}`,
  playerSearch: (query: string) =>
    `/search/search.fcgi?${new URLSearchParams({ search: query }).toString()}`,
});

export const SEASON_LINK_PATTERN = /\/leagues\/NBA_(\d{4})\.html/g;
export const PLAYER_PAGE_PATTERN = /^\/players\/[a-z]\/([a-z0-9]{7,12})\.html$/;

export function buildLeaguesIndexPath(): string {
  return urlPaths.leaguesIndex();
}

export function buildPerGameStatsPath(season: number): string {
  return urlPaths.perGameStats(season);
}

export function buildGameLogPath(playerId: string, season: number): string {
  return urlPaths.gameLog(playerId, season);
}

export function buildPlayerSearchPath(query: string): string {
  return urlPaths.playerSearch(query);
}

export function toAbsoluteUrl(baseUrl: string, path: string): string {
  return new URL(path, `${baseUrl}/`).toString();
}
