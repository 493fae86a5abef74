/**
 * Lookup: fetch one cached record by id
 */

import * as core from '@actions/core';
import {ReadOutcome, ReadStatus, lookupRecord} from '../redis';
import {CommandContext} from './context';

export async function runLookup(context: CommandContext): Promise<ReadOutcome> {
  const recordId = context.config.recordId;
  if (!recordId) {
    throw new Error('Input "record-id" is required for the lookup command');
  }

  core.info(`🔍 Looking up record: ${recordId}`);
  const outcome = await lookupRecord(
    recordId,
    context.openSession,
    context.credentials
  );

  core.setOutput('outcome', outcome.status);
  core.setOutput('cache-hit', (outcome.status === ReadStatus.FOUND).toString());

  switch (outcome.status) {
    case ReadStatus.FOUND:
      core.setOutput('record', outcome.payload);
      core.info(`   ✅ Cache hit for record ${recordId}`);
      break;
    case ReadStatus.NOT_FOUND:
      core.setOutput('record', '');
      core.info(`   ❌ Record not found in cache`);
      break;
    case ReadStatus.AUTH_ERROR:
      core.debug(`  Reason: ${outcome.reason}`);
      throw new Error('Cache authentication failed');
    case ReadStatus.UNAVAILABLE:
      core.debug(`  Reason: ${outcome.reason}`);
      throw new Error('Cache service unavailable');
  }

  return outcome;
}
