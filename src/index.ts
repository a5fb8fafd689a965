#!/usr/bin/env node
import 'dotenv/config';
import { join } from 'node:path';
import { getReportPath, overridesFromArgs, parseCliArgs } from './config/cli.js';
import { loadIngestConfig } from './config/ingest.js';
import { DiffWriter } from './diffs.js';
import { extract } from './extract.js';
import { runIngestion } from './pipeline.js';
import { summarizeReport, type IngestionReport } from './report.js';
import { createStore } from './store/index.js';
import { isDirectusConfigured } from './utils/directus.js';
import { writeJson } from './utils/fs.js';
import { IngestionRun } from './utils/ingestion.js';
import { log } from './utils/log.js';
import { validateReport } from './validate.js';

process.on('uncaughtException', (error) => {
  log.error('Uncaught exception', error);
  process.exit(1);
});

async function writeReport(report: IngestionReport, path: string) {
  await validateReport(report);
  await writeJson(path, report);
  log.info('Report written', { path });
}

async function main() {
  const args = parseCliArgs(process.argv.slice(2));
  const config = loadIngestConfig(overridesFromArgs(args));
  const reportPath = getReportPath(args);

  log.info('Ingestion started', {
    dataRoot: config.dataRoot,
    lang: config.lang,
    store: config.store,
    batchSize: config.batchSize,
    pruneStale: config.pruneStale
  });

  const { collections } = await extract({ dataRoot: config.dataRoot, lang: config.lang });

  const ingestionRun = new IngestionRun();
  const diffs = new DiffWriter({ skip: config.skipDiffs || !isDirectusConfigured() });
  const store = createStore(config);

  try {
    await ingestionRun.start({ store: store.name, dataRoot: config.dataRoot });

    const report = await runIngestion(collections, store, {
      batchSize: config.batchSize,
      pruneStale: config.pruneStale,
      diffs
    });
    const path = reportPath ?? join(config.reportDir, `ingest-${report.runId}.json`);
    await writeReport(report, path);

    const summary = summarizeReport(report);
    await ingestionRun.updateStats(summary);
    if (ingestionRun.id && report.status !== 'failed') {
      await diffs.flush(ingestionRun.id);
    }
    await ingestionRun.finish(report, path);

    if (report.status === 'failed') {
      log.error('Ingestion failed', { ...summary, failure: report.failure });
      process.exitCode = 1;
    } else {
      log.info('Ingestion finished', summary);
    }
  } catch (error) {
    await ingestionRun.finishFail(error);
    throw error;
  } finally {
    await store.close();
  }
}

main().catch((error: unknown) => {
  log.error('Ingestion failed', error);
  process.exitCode = 1;
});
