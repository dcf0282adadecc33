import { parseArgs } from "util";
import { z } from "zod";
import { UsageError } from "./errors";

export const USAGE = `Usage: hoopref-scraper <command> [options]

Commands:
  players     Download per-game stats for all players in a season
              --season N         season end year (default: latest)
              --output FILE      output CSV (default: players_<season>.csv)

  game-logs   Download the last N game logs for one or more players
              PLAYER_ID...       player ids (e.g. jamesle01)
              --input-file FILE  file with one player id per line
              --season N         season end year (default: latest)
              --last N           recent games to keep, 0 for all (default: 15)
              --all-games        keep every game of the season
              --output-dir DIR   directory for per-player CSVs (default: game_logs)
              --combined-output FILE
                                 write all players to one CSV instead

  lookup      Look up player ids by name
              NAME...            player name (e.g. LeBron James)
`;

const SeasonSchema = z.coerce.number().int().min(1947).max(9999).optional();

const PlayersCommandSchema = z.object({
  command: z.literal("players"),
  season: SeasonSchema,
  output: z.string().min(1).optional(),
});

const GameLogsCommandSchema = z.object({
  command: z.literal("game-logs"),
  playerIds: z.array(z.string().min(1)),
  inputFile: z.string().min(1).optional(),
  season: SeasonSchema,
  last: z.coerce.number().int().min(0).default(15),
  allGames: z.boolean().default(false),
  outputDir: z.string().min(1).default("game_logs"),
  combinedOutput: z.string().min(1).optional(),
});

const LookupCommandSchema = z.object({
  command: z.literal("lookup"),
  name: z.array(z.string().min(1)).min(1, "lookup needs a player name"),
});

export const CommandSchema = z.discriminatedUnion("command", [
  PlayersCommandSchema,
  GameLogsCommandSchema,
  LookupCommandSchema,
]);

export type Command = z.infer<typeof CommandSchema>;
export type PlayersCommand = z.infer<typeof PlayersCommandSchema>;
export type GameLogsCommand = z.infer<typeof GameLogsCommandSchema>;
export type LookupCommand = z.infer<typeof LookupCommandSchema>;

function readArgs(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      allowPositionals: true,
      strict: true,
      options: {
        season: { type: "string" },
        output: { type: "string" },
        "input-file": { type: "string" },
        last: { type: "string" },
        "all-games": { type: "boolean" },
        "output-dir": { type: "string" },
        "combined-output": { type: "string" },
        help: { type: "boolean", short: "h" },
      },
    });
  } catch (error) {
    throw new UsageError(error instanceof Error ? error.message : String(error));
  }
}

export function parseCommand(argv: string[]): Command | "help" {
  const { values, positionals } = readArgs(argv);
  const [command, ...rest] = positionals;
  if (values.help || command === undefined || command === "help") return "help";

  let input: Record<string, unknown>;
  switch (command) {
    case "players":
      if (rest.length) throw new UsageError(`Unexpected arguments: ${rest.join(" ")}`);
      input = { command, season: values.season, output: values.output };
      break;
    case "game-logs":
      input = {
        command,
        playerIds: rest,
        inputFile: values["input-file"],
        season: values.season,
        last: values.last,
        allGames: values["all-games"],
        outputDir: values["output-dir"],
        combinedOutput: values["combined-output"],
      };
      break;
    case "lookup":
      input = { command, name: rest };
      break;
    default:
      throw new UsageError(`Unknown command: ${command}`);
  }

  const parsed = CommandSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".") || "arguments"}: ${issue.message}`);
    throw new UsageError(issues.join("; "));
  }
  return parsed.data;
}
