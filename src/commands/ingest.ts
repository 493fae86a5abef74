/**
 * Ingest: index every record in the document store and cache it best-effort
 */

import * as core from '@actions/core';
import {loadRecordFiles} from '../records';
import {WriteOutcome, cacheRecords} from '../redis';
import {parseMultilineInput, resolveGlobPaths} from '../utils';
import {CommandContext} from './context';

export interface IngestSummary {
  recordCount: number;
  indexedCount: number;
  cachedCount: number;
  outcomes: WriteOutcome[];
}

function setIngestOutputs(summary: IngestSummary): void {
  core.setOutput('record-count', summary.recordCount.toString());
  core.setOutput('indexed-count', summary.indexedCount.toString());
  core.setOutput('cached-count', summary.cachedCount.toString());
}

export async function runIngest(context: CommandContext): Promise<IngestSummary> {
  const {config, documents} = context;

  const patterns = parseMultilineInput(config.recordPatterns);
  if (patterns.length === 0) {
    throw new Error('Input "records" is required for the ingest command');
  }

  core.info(`📂 Record files (${patterns.length} patterns):`);
  patterns.forEach(p => core.info(`   - ${p}`));

  const files = await resolveGlobPaths(patterns);
  if (files.length === 0) {
    core.warning('⚠️  No files found matching record patterns - nothing to ingest');
    const empty: IngestSummary = {
      recordCount: 0,
      indexedCount: 0,
      cachedCount: 0,
      outcomes: [],
    };
    setIngestOutputs(empty);
    return empty;
  }

  const records = await loadRecordFiles(files);
  core.info(`   Loaded ${records.length} records from ${files.length} files`);

  let indexedCount = 0;
  if (documents) {
    core.info('🗂️  Indexing records...');
    for (const record of records) {
      try {
        await documents.indexRecord(record);
        indexedCount++;
      } catch (error) {
        const errorMsg = error instanceof Error ? error.message : String(error);
        core.warning(`Failed to index record ${record.id}: ${errorMsg}`);
      }
    }
  } else {
    core.info('ℹ️  No document store configured - skipping indexing');
  }

  core.info('🔌 Caching records...');
  core.debug(
    `  Target: ${config.transport.host}:${config.transport.port}`
  );
  const outcomes = await cacheRecords(
    records,
    context.openSession,
    context.credentials
  );
  const cachedCount = outcomes.filter(o => o === WriteOutcome.CACHED).length;

  const summary: IngestSummary = {
    recordCount: records.length,
    indexedCount,
    cachedCount,
    outcomes,
  };
  setIngestOutputs(summary);

  core.info(`✅ Processed ${records.length} records, cached ${cachedCount} records`);
  if (documents) {
    core.info(`   Indexed ${indexedCount} of ${records.length} records`);
  }
  if (cachedCount < records.length) {
    core.info(
      `   ${records.length - cachedCount} records were not cached (cache is best-effort)`
    );
  }

  return summary;
}
