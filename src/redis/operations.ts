/**
 * Cache operations for ingest and lookup
 *
 * Writes are best-effort: no cache failure ever escapes cacheRecords.
 * Reads report every failure as an outcome, with authentication problems
 * kept apart from an unavailable cache.
 */

import * as core from '@actions/core';
import {CredentialResolver} from '../credentials';
import {EventRecord, toEventRecord} from '../records';
import {Reply, describeReply} from '../resp';
import {formatBytes} from '../utils';
import {CacheSession, SessionFactory} from './session';
import {AuthResult, ReadOutcome, ReadStatus, WriteOutcome} from './types';

const KEY_PREFIX = 'event:';

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * One cache entry per record id; later writes overwrite earlier ones
 */
export function getCacheKey(recordId: string | number): string {
  return `${KEY_PREFIX}${recordId}`;
}

export function serializeRecord(record: EventRecord): string {
  return JSON.stringify(record);
}

export function parseCachedRecord(payload: string): EventRecord {
  return toEventRecord(JSON.parse(payload));
}

/**
 * Authenticate for the write path. False means caching is skipped.
 */
async function authenticateForWrite(
  session: CacheSession,
  credentials: CredentialResolver
): Promise<boolean> {
  let token: string | undefined;
  try {
    token = await credentials.resolveToken();
  } catch (error) {
    core.warning(`Failed to get AUTH token: ${errorMessage(error)}`);
    return false;
  }

  if (token === undefined) {
    core.debug('No AUTH token configured - skipping AUTH');
    return true;
  }

  try {
    const result = await session.authenticate(token);
    if (result === 'auth_failed') {
      core.warning('Redis AUTH rejected - skipping cache for this batch');
      return false;
    }
    return true;
  } catch (error) {
    core.warning(`Redis AUTH failed: ${errorMessage(error)}`);
    return false;
  }
}

/**
 * SET one record on an already prepared session
 */
export async function cacheRecord(
  session: CacheSession,
  record: EventRecord
): Promise<WriteOutcome> {
  const key = getCacheKey(record.id);
  const value = serializeRecord(record);

  try {
    const reply = await session.execute(['SET', key, value]);

    if (reply.type === 'status' && reply.value === 'OK') {
      core.debug(`Cached record ${record.id} (${formatBytes(Buffer.byteLength(value))})`);
      return WriteOutcome.CACHED;
    }

    core.warning(`Redis SET failed for ${record.id}: ${describeReply(reply)}`);
    return WriteOutcome.SKIPPED_NO_CACHE;
  } catch (error) {
    core.warning(`Failed to cache record ${record.id}: ${errorMessage(error)}`);
    return WriteOutcome.SKIPPED_NO_CACHE;
  }
}

/**
 * Write a batch of records through one session, in order.
 * Returns one outcome per record and never throws for cache failures.
 */
export async function cacheRecords(
  records: EventRecord[],
  openSession: SessionFactory,
  credentials: CredentialResolver
): Promise<WriteOutcome[]> {
  const skipAll = (): WriteOutcome[] =>
    records.map(() => WriteOutcome.SKIPPED_NO_CACHE);

  if (records.length === 0) {
    return [];
  }

  let session: CacheSession;
  try {
    session = await openSession();
  } catch (error) {
    core.warning(
      `Redis connection failed: ${errorMessage(error)}, proceeding without cache`
    );
    return skipAll();
  }

  try {
    if (!(await authenticateForWrite(session, credentials))) {
      return skipAll();
    }

    if (!(await session.ping())) {
      core.warning('Redis PING failed - proceeding without cache');
      return skipAll();
    }
    core.debug('Connected to Redis successfully');

    const outcomes: WriteOutcome[] = [];
    for (const record of records) {
      outcomes.push(await cacheRecord(session, record));
    }
    return outcomes;
  } finally {
    session.close();
  }
}

/**
 * Fetch one record by id through a fresh session
 */
export async function lookupRecord(
  recordId: string,
  openSession: SessionFactory,
  credentials: CredentialResolver
): Promise<ReadOutcome> {
  let session: CacheSession;
  try {
    session = await openSession();
  } catch (error) {
    core.error(`Cache lookup error: ${errorMessage(error)}`);
    return {status: ReadStatus.UNAVAILABLE, reason: errorMessage(error)};
  }

  try {
    let token: string | undefined;
    try {
      token = await credentials.resolveToken();
    } catch (error) {
      core.warning(`Failed to get AUTH token: ${errorMessage(error)}`);
      return {status: ReadStatus.AUTH_ERROR, reason: errorMessage(error)};
    }

    if (token !== undefined) {
      let result: AuthResult;
      try {
        result = await session.authenticate(token);
      } catch (error) {
        core.error(`Cache lookup error: ${errorMessage(error)}`);
        return {status: ReadStatus.UNAVAILABLE, reason: errorMessage(error)};
      }
      if (result === 'auth_failed') {
        return {status: ReadStatus.AUTH_ERROR, reason: 'AUTH rejected'};
      }
    }

    const key = getCacheKey(recordId);
    let reply: Reply;
    try {
      reply = await session.execute(['GET', key]);
    } catch (error) {
      core.error(`Cache lookup error: ${errorMessage(error)}`);
      return {status: ReadStatus.UNAVAILABLE, reason: errorMessage(error)};
    }

    if (reply.type !== 'bulk') {
      core.error(`Unexpected GET reply for ${key}: ${describeReply(reply)}`);
      return {
        status: ReadStatus.UNAVAILABLE,
        reason: `Unexpected reply ${describeReply(reply)}`,
      };
    }

    if (reply.value === null) {
      core.debug(`Cache miss for ${key}`);
      return {status: ReadStatus.NOT_FOUND};
    }

    const payload = reply.value.toString('utf8');
    try {
      return {
        status: ReadStatus.FOUND,
        payload,
        record: parseCachedRecord(payload),
      };
    } catch (error) {
      core.error(`Failed to parse cache response for ${key}: ${errorMessage(error)}`);
      return {
        status: ReadStatus.UNAVAILABLE,
        reason: 'Failed to parse cache response',
      };
    }
  } finally {
    session.close();
  }
}
