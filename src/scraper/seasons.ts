import { SeasonNotFoundError } from "../errors";
import type { DocumentFetcher } from "../types";
import { buildLeaguesIndexPath, buildPerGameStatsPath, SEASON_LINK_PATTERN } from "../urls";
import { logger } from "../utils/logger";
import { firstSuccess } from "./attempts";
import { extractTable } from "./table";

export const PER_GAME_TABLE_ID = "per_game_stats";
export const ACTIVE_LEAGUES_TABLE_ID = "leagues_active";
export const EXTRA_SEASONS_TO_PROBE = 5;

function parseYear(text: string): number | null {
  const trimmed = text.trim();
  return /^\d+$/.test(trimmed) ? Number.parseInt(trimmed, 10) : null;
}

/**
 * Converts a season label to the year the season ends in:
 * "2023-24" -> 2024, "1999-00" -> 2000, "2021" -> 2021.
 */
export function parseSeasonLabel(label: string): number | null {
  const dash = label.indexOf("-");
  if (dash === -1) return parseYear(label);

  const start = parseYear(label.slice(0, dash));
  const endSuffix = parseYear(label.slice(dash + 1));
  if (start === null || endSuffix === null) return null;

  let end = Math.floor(start / 100) * 100 + endSuffix;
  if (end < start) end += 100;
  return end;
}

export function findSeasonCandidates(html: string): number[] {
  const years = [...html.matchAll(SEASON_LINK_PATTERN)].map((match) => Number.parseInt(match[1], 10));
  if (years.length) return years;

  const table = extractTable(html, ACTIVE_LEAGUES_TABLE_ID);
  for (const row of table.rows) {
    const year = parseSeasonLabel(row[0]);
    if (year !== null) return [year];
  }
  return [];
}

export async function probeSeason(fetchDocument: DocumentFetcher, season: number): Promise<number> {
  const html = await fetchDocument(buildPerGameStatsPath(season));
  extractTable(html, PER_GAME_TABLE_ID);
  return season;
}

function* yearsBelow(newest: number, tried: Set<number>) {
  for (let delta = 1; delta <= EXTRA_SEASONS_TO_PROBE; delta++) {
    const year = newest - delta;
    if (!tried.has(year)) yield year;
  }
}

/**
 * Newest season whose per-game stats table can actually be parsed. The
 * league index may already link a season whose tables are not populated yet,
 * so every candidate is probed before it is trusted.
 */
export async function detectLatestSeason(fetchDocument: DocumentFetcher): Promise<number> {
  const html = await fetchDocument(buildLeaguesIndexPath());
  const candidates = findSeasonCandidates(html);
  if (!candidates.length) {
    throw new SeasonNotFoundError("Could not detect the latest season.");
  }

  const ordered = [...new Set(candidates)].sort((a, b) => b - a);
  logger.debug(`Season candidates: ${ordered.join(", ")}`);

  const probe = (season: number) => probeSeason(fetchDocument, season);
  const validated = await firstSuccess(ordered, probe, "Season");
  if (validated.ok) return validated.value;

  const tried = new Set(ordered);
  const fallback = await firstSuccess(yearsBelow(ordered[0], tried), probe, "Season");
  if (fallback.ok) return fallback.value;

  const attempted = [...ordered, ...fallback.tried];
  throw new SeasonNotFoundError(
    `Could not find a recent season with per-game stats available (tried ${attempted.join(", ")}).`,
    attempted,
    fallback.lastError ?? validated.lastError
  );
}
