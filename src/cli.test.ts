import { describe, expect, it } from "vitest";
import { parseCommand } from "./cli";
import { UsageError } from "./errors";

describe("parseCommand", () => {
  it("parses the players command", () => {
    expect(parseCommand(["players", "--season", "2024", "--output", "out.csv"])).toEqual({
      command: "players",
      season: 2024,
      output: "out.csv",
    });
  });

  it("applies game-logs defaults", () => {
    expect(parseCommand(["game-logs", "testpl01", "otherpl02"])).toEqual({
      command: "game-logs",
      playerIds: ["testpl01", "otherpl02"],
      inputFile: undefined,
      season: undefined,
      last: 15,
      allGames: false,
      outputDir: "game_logs",
      combinedOutput: undefined,
    });
  });

  it("reads game-logs options", () => {
    const command = parseCommand([
      "game-logs",
      "--input-file",
      "ids.txt",
      "--last",
      "5",
      "--all-games",
      "--combined-output",
      "all.csv",
    ]);
    expect(command).toMatchObject({
      command: "game-logs",
      playerIds: [],
      inputFile: "ids.txt",
      last: 5,
      allGames: true,
      combinedOutput: "all.csv",
    });
  });

  it("treats --last 0 as every game", () => {
    expect(parseCommand(["game-logs", "testpl01", "--last", "0"])).toMatchObject({ last: 0, allGames: false });
  });

  it("keeps every name part for lookup", () => {
    expect(parseCommand(["lookup", "Test", "Player"])).toEqual({ command: "lookup", name: ["Test", "Player"] });
  });

  it("returns help without a command", () => {
    expect(parseCommand([])).toBe("help");
    expect(parseCommand(["players", "--help"])).toBe("help");
  });

  it.each([
    [["fetch"]],
    [["players", "--season", "soon"]],
    [["game-logs", "testpl01", "--last", "-1"]],
    [["lookup"]],
    [["players", "--unknown"]],
  ])("rejects %j", (argv) => {
    expect(() => parseCommand(argv)).toThrow(UsageError);
  });
});
