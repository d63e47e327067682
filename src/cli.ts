#!/usr/bin/env node
import 'reflect-metadata';
import { promises as fs } from 'fs';
import path from 'path';
import { Command } from 'commander';
import { Logger as NestLogger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { Logger } from 'nestjs-pino';
import { AppModule } from './app.module';
import { reportFatalError } from './common/fatal-error';
import { CsvService } from './csv/csv.service';
import { EnrichmentService } from './enrichment/enrichment.service';

const cliLogger = new NestLogger('Cli');

interface EnrichOptions {
  input: string;
  output: string;
}

interface SampleOptions {
  output: string;
}

async function runEnrich(options: EnrichOptions): Promise<void> {
  const app = await NestFactory.createApplicationContext(AppModule, {
    bufferLogs: true,
  });
  app.useLogger(app.get(Logger));
  const logger = app.get(Logger);

  try {
    const inputPath = path.resolve(options.input);
    const outputPath = path.resolve(options.output);
    logger.log(`Input: ${inputPath}`);
    logger.log(`Output: ${outputPath}`);

    const csvService = app.get(CsvService);
    const enrichmentService = app.get(EnrichmentService);

    const names = await csvService.parseCompanyNames(
      await fs.readFile(inputPath),
    );
    const records = await enrichmentService.enrich(names);
    await fs.writeFile(outputPath, await csvService.toCsv(records), 'utf8');

    const summary = enrichmentService.summarize(records);
    logger.log(
      `Processed ${summary.total} companies: ${summary.succeeded} enriched, ${summary.failed} failed (${summary.successRate}%)`,
    );
  } finally {
    await app.close();
  }
}

async function runSample(options: SampleOptions): Promise<void> {
  const outputPath = path.resolve(options.output);
  await fs.writeFile(outputPath, new CsvService().sampleCsv(), 'utf8');
  cliLogger.log(`Sample CSV written to ${outputPath}`);
}

function fail(error: unknown): void {
  reportFatalError(cliLogger, 'Fatal Error', error);
}

const program = new Command();

program
  .name('company-enrichment')
  .description('Enrich company names with website, industry, size and HQ')
  .version('0.1.0');

program
  .command('enrich')
  .description('Enrich the company_name column of a CSV file')
  .requiredOption('-i, --input <path>', 'Input CSV file path')
  .requiredOption('-o, --output <path>', 'Output CSV file path')
  .action((options: EnrichOptions) => runEnrich(options).catch(fail));

program
  .command('sample')
  .description('Write a sample input CSV')
  .option('-o, --output <path>', 'Output CSV file path', 'sample_companies.csv')
  .action((options: SampleOptions) => runSample(options).catch(fail));

program.parseAsync(process.argv).catch(fail);
