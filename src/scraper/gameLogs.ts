import { z } from "zod";
import { GameLogNotFoundError, InvalidPlayerIdError, ScrapeError } from "../errors";
import type { DocumentFetcher, RecordSet, Table } from "../types";
import { buildGameLogPath } from "../urls";
import { logger } from "../utils/logger";
import { firstSuccess } from "./attempts";
import { extractTable, toRecordSet } from "./table";

// Historical id first, then the one current pages use.
export const GAME_LOG_TABLE_IDS = ["pgl_basic", "player_game_log_reg"] as const;

export const EARLIEST_FALLBACK_SEASON = 2000;
export const PRIOR_SEASONS_TO_TRY = 4;

export const PlayerIdSchema = z.string().regex(/^[a-z][a-z0-9]*$/);

export function gameLogSeasons(season: number): number[] {
  const seasons = [season];
  for (let delta = 1; delta <= PRIOR_SEASONS_TO_TRY; delta++) {
    if (season - delta > EARLIEST_FALLBACK_SEASON) seasons.push(season - delta);
  }
  return seasons;
}

export async function extractGameLogTable(html: string): Promise<Table> {
  const outcome = await firstSuccess(GAME_LOG_TABLE_IDS, (tableId) => extractTable(html, tableId), "Game log table");
  if (outcome.ok) return outcome.value;
  throw new ScrapeError(
    `No known game log table id found (tried ${GAME_LOG_TABLE_IDS.join(", ")}).`,
    outcome.lastError
  );
}

/**
 * Game log rows for one player, walking back from `season` when a season's
 * page is missing or carries none of the known table ids. `lastN` keeps the
 * trailing rows; 0 or undefined keeps all of them.
 */
export async function fetchGameLogs(
  fetchDocument: DocumentFetcher,
  playerId: string,
  season: number,
  lastN?: number
): Promise<RecordSet> {
  if (!PlayerIdSchema.safeParse(playerId).success) {
    throw new InvalidPlayerIdError(playerId);
  }

  const seasons = gameLogSeasons(season);
  const outcome = await firstSuccess(
    seasons,
    async (target) => extractGameLogTable(await fetchDocument(buildGameLogPath(playerId, target))),
    `Game log season for ${playerId}`
  );

  if (!outcome.ok) {
    throw new GameLogNotFoundError(playerId, outcome.tried, outcome.lastError);
  }
  if (outcome.candidate !== season) {
    logger.info(`Using season ${outcome.candidate} game log for ${playerId} (season ${season} unavailable)`);
  }

  const { headers, rows } = outcome.value;
  const kept = lastN && lastN > 0 ? rows.slice(-lastN) : rows;
  return toRecordSet(headers, kept);
}
