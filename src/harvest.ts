#!/usr/bin/env node
import 'dotenv/config';
import { join } from 'node:path';
import { loadConfig } from './config.js';
import { writeExports } from './export/exporter.js';
import { runHarvestPipeline } from './pipeline/harvestRun.js';
import { progressPrinter } from './pipeline/progress.js';
import { ALL_REGIONS, isRegion } from './types.js';
import type { Region } from './types.js';
import { RunLogger } from './utils/logger.js';

interface CliArgs {
  keyword?: string;
  regions: Region[];
  outputDir?: string;
  archive: boolean;
  workbook: boolean;
}

const USAGE = `Usage: harvest [--keyword <text>] [--region <name>]... [--out <dir>] [--zip] [--xlsx]
Regions: ${ALL_REGIONS.map((region) => JSON.stringify(region)).join(', ')} (default: all)`;

function parseArgs(argv: string[]): CliArgs {
  const args: CliArgs = { regions: [], archive: false, workbook: false };
  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    const value = argv[i + 1];
    if (arg === '--keyword' && value !== undefined) {
      args.keyword = value;
      i += 1;
      continue;
    }
    if (arg === '--region' && value !== undefined) {
      if (!isRegion(value)) {
        throw new Error(`Unknown region "${value}"\n${USAGE}`);
      }
      if (!args.regions.includes(value)) {
        args.regions.push(value);
      }
      i += 1;
      continue;
    }
    if (arg === '--out' && value !== undefined) {
      args.outputDir = value;
      i += 1;
      continue;
    }
    if (arg === '--zip') {
      args.archive = true;
      continue;
    }
    if (arg === '--xlsx') {
      args.workbook = true;
      continue;
    }
    throw new Error(`Unexpected argument "${arg}"\n${USAGE}`);
  }
  return args;
}

function dateStamp(date = new Date()): string {
  return date.toISOString().slice(0, 10);
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  const config = loadConfig();
  const runDate = dateStamp();
  const logger = new RunLogger(join(config.logDir, `harvest_${runDate}.log`), 'Harvest run', true);
  await logger.init();

  try {
    const result = await runHarvestPipeline({
      query: { keyword: args.keyword, regions: args.regions },
      config,
      logger,
      onProgress: progressPrinter((line) => process.stderr.write(line)),
    });

    if (result.raw.length === 0 && !result.error) {
      await logger.warn('No jobs found.');
      return;
    }

    const written = await writeExports(args.outputDir ?? config.outputDir, `jobs_${runDate}`, result.raw, result.normalized, {
      archive: args.archive,
      workbook: args.workbook,
    });
    await logger.info(`Wrote ${written.rawPath} and ${written.normalizedPath}`);
    if (written.archivePath) {
      await logger.info(`Wrote ${written.archivePath}`);
    }
    if (written.workbookPath) {
      await logger.info(`Wrote ${written.workbookPath}`);
    }

    console.log(`Found ${result.raw.length} jobs across ${result.pages} page(s).`);
    if (result.capped) {
      console.log(`Stopped at the ${config.maxRecords}-record cap.`);
    }
    if (result.error) {
      console.error(`Harvest incomplete (${result.error.kind}): ${result.error.message}`);
      process.exitCode = 1;
    }
  } finally {
    await logger.close();
  }
}

main().catch((error) => {
  console.error(`Harvest failed: ${error instanceof Error ? error.message : String(error)}`);
  process.exitCode = 1;
});
