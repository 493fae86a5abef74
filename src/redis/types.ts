/**
 * Redis module types and interfaces
 */

import {EventRecord} from '../records';

export interface TransportConfig {
  host: string;
  port: number;
  /**
   * Wrap the socket in TLS. Plain TCP is only meant for in-cluster caches.
   */
  tls: boolean;
  /**
   * Skip certificate and hostname verification. Deployments that enable this
   * rely on network isolation instead of certificate trust.
   */
  insecureTransport: boolean;
  connectTimeoutMs: number;
  commandTimeoutMs: number;
}

export type SessionState =
  | 'connected'
  | 'auth_pending'
  | 'authenticated'
  | 'auth_failed'
  | 'closed';

export type AuthResult = 'authenticated' | 'auth_failed';

export enum WriteOutcome {
  CACHED = 'cached',
  SKIPPED_NO_CACHE = 'skipped-no-cache',
}

export enum ReadStatus {
  FOUND = 'found',
  NOT_FOUND = 'not-found',
  AUTH_ERROR = 'auth-error',
  UNAVAILABLE = 'unavailable',
}

export type ReadOutcome =
  | {status: ReadStatus.FOUND; payload: string; record: EventRecord}
  | {status: ReadStatus.NOT_FOUND}
  | {status: ReadStatus.AUTH_ERROR; reason: string}
  | {status: ReadStatus.UNAVAILABLE; reason: string};
