import fs from "fs/promises";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { NoRowsError } from "../errors";
import { CsvStorage, concatRecordSets, withColumn } from "./csv";

let dir: string;

beforeEach(async () => {
  dir = await fs.mkdtemp(path.join(os.tmpdir(), "hoopref-csv-"));
});

afterEach(async () => {
  await fs.rm(dir, { recursive: true, force: true });
});

describe("CsvStorage", () => {
  it("round-trips header order and cell values", async () => {
    const storage = new CsvStorage(dir);
    const rows = {
      columns: ["Player", "Pos", "PTS", "Notes"],
      records: [
        { Player: "Smith, Test", Pos: "G", PTS: "21.4", Notes: 'said "hi"' },
        { Player: "Jones", Pos: "F-C", PTS: "8.0", Notes: "" },
      ],
    };

    await storage.write("nested/out.csv", rows);

    await expect(storage.read("nested/out.csv")).resolves.toEqual(rows);
  });

  it("writes the header row first", async () => {
    const storage = new CsvStorage(dir);
    await storage.write("out.csv", { columns: ["B", "A"], records: [{ A: "1", B: "2" }] });

    const content = await fs.readFile(path.join(dir, "out.csv"), "utf-8");
    expect(content).toBe("B,A\n2,1\n");
  });

  it("refuses to write an empty record set", async () => {
    const storage = new CsvStorage(dir);
    await expect(storage.write("empty.csv", { columns: ["A"], records: [] })).rejects.toThrow(NoRowsError);
  });
});

describe("withColumn", () => {
  it("appends an identifying column to every record", () => {
    const tagged = withColumn({ columns: ["Date"], records: [{ Date: "2024-01-01" }] }, "PlayerID", "testpl01");
    expect(tagged).toEqual({
      columns: ["Date", "PlayerID"],
      records: [{ Date: "2024-01-01", PlayerID: "testpl01" }],
    });
  });
});

describe("concatRecordSets", () => {
  it("unions columns in first-seen order", () => {
    const merged = concatRecordSets([
      { columns: ["A", "B"], records: [{ A: "1", B: "2" }] },
      { columns: ["A", "C"], records: [{ A: "3", C: "4" }] },
    ]);
    expect(merged.columns).toEqual(["A", "B", "C"]);
    expect(merged.records).toHaveLength(2);
  });
});
