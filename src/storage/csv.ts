import { parse } from "csv-parse/sync";
import { createObjectCsvWriter } from "csv-writer";
import fs from "fs/promises";
import path from "path";
import { NoRowsError } from "../errors";
import type { RecordSet, StatRecord } from "../types";
import { logger } from "../utils/logger";
import type { RowStorage } from "./interface";
import { StorageError } from "./interface";

export class CsvStorage implements RowStorage {
  protected readonly baseDir: string;

  constructor(baseDir = ".") {
    this.baseDir = baseDir;
  }

  resolve(target: string): string {
    return path.resolve(this.baseDir, target);
  }

  async write(target: string, rows: RecordSet): Promise<void> {
    if (!rows.records.length) {
      throw new NoRowsError();
    }

    const file = this.resolve(target);
    try {
      await fs.mkdir(path.dirname(file), { recursive: true });

      const csvWriter = createObjectCsvWriter({
        path: file,
        header: rows.columns.map((key) => ({
          id: key,
          title: key,
        })),
      });

      await csvWriter.writeRecords(rows.records);
      logger.debug(`Wrote ${rows.records.length} rows to ${file}`);
    } catch (error) {
      throw new StorageError(`Failed to write ${file}`, error);
    }
  }

  async read(target: string): Promise<RecordSet> {
    const file = this.resolve(target);
    try {
      const content = await fs.readFile(file, "utf-8");
      const [columns = [], ...lines]: string[][] = parse(content, {
        skip_empty_lines: true,
      });

      const records = lines.map((line) => {
        const record: StatRecord = {};
        columns.forEach((column, index) => {
          record[column] = line[index] ?? "";
        });
        return record;
      });

      return { columns, records };
    } catch (error) {
      throw new StorageError(`Failed to read ${file}`, error);
    }
  }
}

export function withColumn(rows: RecordSet, column: string, value: string): RecordSet {
  return {
    columns: rows.columns.includes(column) ? rows.columns : [...rows.columns, column],
    records: rows.records.map((record) => ({ ...record, [column]: value })),
  };
}

export function concatRecordSets(sets: RecordSet[]): RecordSet {
  const columns = [...new Set(sets.flatMap((set) => set.columns))];
  return { columns, records: sets.flatMap((set) => set.records) };
}
