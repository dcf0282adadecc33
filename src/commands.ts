import fs from "fs/promises";
import path from "path";
import type { GameLogsCommand, LookupCommand, PlayersCommand } from "./cli";
import { InputFileError, ScrapeError } from "./errors";
import type { StatsScraper } from "./scraper/scraper";
import { concatRecordSets, withColumn } from "./storage/csv";
import type { RowStorage } from "./storage/interface";
import type { RecordSet } from "./types";
import { logger } from "./utils/logger";
import { createProgressBar } from "./utils/progress";

export const PLAYER_ID_COLUMN = "PlayerID";
export const MAX_LOOKUP_RESULTS = 20;

export interface CommandContext {
  scraper: StatsScraper;
  storage: RowStorage;
  write: (line: string) => void;
  showProgress?: boolean;
}

export async function runPlayers(command: PlayersCommand, ctx: CommandContext): Promise<string> {
  const season = command.season ?? (await ctx.scraper.detectLatestSeason());
  const rows = await ctx.scraper.fetchPlayerSeasonTable(season);
  const output = command.output ?? `players_${season}.csv`;

  await ctx.storage.write(output, rows);
  logger.info(`Saved per-game stats for season ${season} to ${output}`);
  return output;
}

export async function readPlayerIds(file: string): Promise<string[]> {
  let content: string;
  try {
    content = await fs.readFile(file, "utf-8");
  } catch (error) {
    throw new InputFileError(file, error);
  }
  return content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line && !line.startsWith("#"));
}

export async function collectPlayerIds(command: GameLogsCommand): Promise<string[]> {
  const ids = [...command.playerIds];
  if (command.inputFile !== undefined) {
    ids.push(...(await readPlayerIds(command.inputFile)));
  }
  const unique = [...new Set(ids)];
  if (!unique.length) {
    throw new ScrapeError("No player ids provided.");
  }
  return unique;
}

export function gameLogFileName(playerId: string, lastN: number, season: number): string {
  const label = lastN === 0 ? "all" : `last${lastN}`;
  return `${playerId}_${label}_${season}.csv`;
}

export async function runGameLogs(command: GameLogsCommand, ctx: CommandContext): Promise<string[]> {
  const playerIds = await collectPlayerIds(command);
  const season = command.season ?? (await ctx.scraper.detectLatestSeason());
  const lastN = command.allGames ? 0 : command.last;
  const progress = ctx.showProgress ? createProgressBar(playerIds.length, "Fetching game logs", "players") : null;

  const perPlayer: RecordSet[] = [];
  const written: string[] = [];
  try {
    for (const playerId of playerIds) {
      const rows = await ctx.scraper.fetchGameLogs(playerId, season, lastN);

      if (command.combinedOutput !== undefined) {
        perPlayer.push(withColumn(rows, PLAYER_ID_COLUMN, playerId));
      } else {
        const output = path.join(command.outputDir, gameLogFileName(playerId, lastN, season));
        await ctx.storage.write(output, rows);
        written.push(output);
        logger.info(`Saved ${rows.records.length} games for ${playerId} (season ${season}) to ${output}`);
      }
      progress?.increment(playerId);
    }
  } finally {
    progress?.finish();
  }

  if (command.combinedOutput !== undefined) {
    const combined = concatRecordSets(perPlayer);
    const columns = [...combined.columns.filter((column) => column !== PLAYER_ID_COLUMN), PLAYER_ID_COLUMN];
    await ctx.storage.write(command.combinedOutput, { columns, records: combined.records });
    const label = lastN === 0 ? "all" : `last ${lastN}`;
    logger.info(
      `Saved ${label} games for ${playerIds.length} players (season ${season}) to ${command.combinedOutput}`
    );
    written.push(command.combinedOutput);
  }
  return written;
}

export async function runLookup(command: LookupCommand, ctx: CommandContext): Promise<void> {
  const query = command.name.join(" ");
  const results = await ctx.scraper.searchPlayers(query);
  if (!results.length) {
    ctx.write(`No players found for: ${query}`);
    return;
  }
  for (const item of results.slice(0, MAX_LOOKUP_RESULTS)) {
    ctx.write(`${item.id}: ${item.name} (${item.url})`);
  }
}
