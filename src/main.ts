import { parseCommand, USAGE } from "./cli";
import { runGameLogs, runLookup, runPlayers, type CommandContext } from "./commands";
import { NetworkError, ScrapeError, UsageError } from "./errors";
import { StorageError } from "./storage/interface";
import { logger } from "./utils/logger";

export const EXIT_OK = 0;
export const EXIT_NETWORK = 1;
export const EXIT_SCRAPE = 2;

export async function main(argv: string[], ctx: CommandContext): Promise<number> {
  try {
    const command = parseCommand(argv);
    if (command === "help") {
      ctx.write(USAGE);
      return EXIT_OK;
    }

    switch (command.command) {
      case "players":
        await runPlayers(command, ctx);
        break;
      case "game-logs":
        await runGameLogs(command, ctx);
        break;
      case "lookup":
        await runLookup(command, ctx);
        break;
    }
    return EXIT_OK;
  } catch (error) {
    if (error instanceof UsageError) {
      logger.error(error.message);
      ctx.write(USAGE);
      return EXIT_SCRAPE;
    }
    if (error instanceof NetworkError) {
      logger.error("Network error:", error);
      return EXIT_NETWORK;
    }
    if (error instanceof ScrapeError || error instanceof StorageError) {
      logger.error("Failed to scrape data:", error);
      return EXIT_SCRAPE;
    }
    throw error;
  }
}
