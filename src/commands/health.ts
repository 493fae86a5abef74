/**
 * Health: probe the cache (AUTH if configured, then PING) and, when one is
 * configured, the document store
 */

import * as core from '@actions/core';
import {CacheSession} from '../redis';
import {CommandContext} from './context';

export type ServiceStatus = 'healthy' | 'unhealthy' | 'not-configured';

export interface HealthReport {
  status: 'healthy' | 'degraded';
  cache: ServiceStatus;
  documentStore: ServiceStatus;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

async function checkCache(context: CommandContext): Promise<ServiceStatus> {
  let session: CacheSession | undefined;

  try {
    session = await context.openSession();

    const token = await context.credentials.resolveToken();
    const authResult =
      token === undefined ? 'authenticated' : await session.authenticate(token);

    const healthy = authResult === 'authenticated' && (await session.ping());
    return healthy ? 'healthy' : 'unhealthy';
  } catch (error) {
    core.warning(`Cache health check failed: ${errorMessage(error)}`);
    return 'unhealthy';
  } finally {
    session?.close();
  }
}

async function checkDocumentStore(context: CommandContext): Promise<ServiceStatus> {
  if (!context.documents) {
    return 'not-configured';
  }

  try {
    return (await context.documents.health()) ? 'healthy' : 'unhealthy';
  } catch (error) {
    core.warning(`Document store health check failed: ${errorMessage(error)}`);
    return 'unhealthy';
  }
}

export async function runHealthCheck(context: CommandContext): Promise<HealthReport> {
  const {host, port} = context.config.transport;
  core.info(`🩺 Checking cache at ${host}:${port}`);

  const cache = await checkCache(context);
  const documentStore = await checkDocumentStore(context);
  const status =
    cache === 'healthy' && documentStore !== 'unhealthy' ? 'healthy' : 'degraded';

  core.setOutput('cache-status', cache);
  core.setOutput('document-store-status', documentStore);
  core.setOutput('status', status);

  core.info(`   Cache: ${cache}`);
  core.info(`   Document store: ${documentStore}`);
  core.info(status === 'healthy' ? '   ✅ All services healthy' : '   ⚠️  Degraded');

  return {status, cache, documentStore};
}
