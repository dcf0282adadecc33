#!/usr/bin/env node
import { config } from "./config";
import { main } from "./main";
import { createScraper } from "./scraper/scraper";
import { CsvStorage } from "./storage/csv";
import { logger } from "./utils/logger";

const runMain = async () => {
  try {
    const exitCode = await main(process.argv.slice(2), {
      scraper: createScraper(config),
      storage: new CsvStorage(config.outputDir),
      write: (line) => process.stdout.write(`${line}\n`),
      showProgress: process.stdout.isTTY,
    });
    process.exit(exitCode);
  } catch (error) {
    logger.error("Unexpected failure:", error);
    process.exit(1);
  }
};

void runMain();
