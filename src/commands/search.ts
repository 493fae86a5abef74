/**
 * Search: free-text query against the document store
 */

import * as core from '@actions/core';
import {SearchResult} from '../documents';
import {CommandContext} from './context';

export async function runSearch(context: CommandContext): Promise<SearchResult> {
  if (!context.documents) {
    throw new Error('Input "document-store-url" is required for the search command');
  }

  const query = context.config.query || '*';
  core.info(`🔎 Searching "${context.config.documentIndex}" for: ${query}`);

  const result = await context.documents.search(query, context.config.searchSize);

  core.setOutput('hits', JSON.stringify(result.hits));
  core.setOutput('total', result.total.toString());
  core.setOutput('max-score', result.maxScore === null ? '' : result.maxScore.toString());
  core.info(`   Found ${result.total} matches (${result.hits.length} returned)`);

  return result;
}
