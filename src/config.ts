/**
 * Action inputs normalised into typed configuration
 */

import * as core from '@actions/core';
import {TransportConfig} from './redis';

export const COMMANDS = ['ingest', 'lookup', 'search', 'health'] as const;

export type Command = (typeof COMMANDS)[number];

export interface ActionConfig {
  command: Command;
  transport: TransportConfig;
  redisPassword?: string;
  authSecretId?: string;
  awsRegion?: string;
  recordPatterns: string;
  recordId: string;
  query: string;
  documentStoreUrl?: string;
  documentIndex: string;
  documentStoreToken?: string;
  documentStoreTimeoutMs: number;
  searchSize: number;
}

function isCommand(value: string): value is Command {
  return COMMANDS.some(command => command === value);
}

function optionalInput(name: string): string | undefined {
  return core.getInput(name) || undefined;
}

function readInteger(name: string, defaultValue: number, min = 1): number {
  const raw = core.getInput(name);
  if (!raw) {
    return defaultValue;
  }

  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new Error(`Input "${name}" must be an integer >= ${min}, got "${raw}"`);
  }
  return value;
}

function readBoolean(name: string, defaultValue: boolean): boolean {
  const raw = core.getInput(name).toLowerCase();
  if (!raw) {
    return defaultValue;
  }
  if (raw === 'true') return true;
  if (raw === 'false') return false;
  throw new Error(`Input "${name}" must be "true" or "false", got "${raw}"`);
}

export function getActionConfig(): ActionConfig {
  const command = core.getInput('command', {required: true});
  if (!isCommand(command)) {
    throw new Error(
      `Unknown command "${command}" (expected one of: ${COMMANDS.join(', ')})`
    );
  }

  const port = readInteger('redis-port', 6379);
  if (port > 65535) {
    throw new Error(`Input "redis-port" must be a valid port, got "${port}"`);
  }

  const redisPassword = optionalInput('redis-password');
  if (redisPassword) {
    core.setSecret(redisPassword);
  }
  const documentStoreToken = optionalInput('document-store-token');
  if (documentStoreToken) {
    core.setSecret(documentStoreToken);
  }

  return {
    command,
    transport: {
      host: core.getInput('redis-host') || 'localhost',
      port,
      tls: readBoolean('tls', true),
      insecureTransport: readBoolean('insecure-transport', false),
      connectTimeoutMs: readInteger('connect-timeout-seconds', 5) * 1000,
      commandTimeoutMs: readInteger('command-timeout-seconds', 5) * 1000,
    },
    redisPassword,
    authSecretId: optionalInput('redis-auth-secret-id'),
    awsRegion: optionalInput('aws-region'),
    recordPatterns: core.getInput('records'),
    recordId: core.getInput('record-id'),
    query: core.getInput('query'),
    documentStoreUrl: optionalInput('document-store-url'),
    documentIndex: core.getInput('document-index') || 'user-events',
    documentStoreToken,
    documentStoreTimeoutMs: readInteger('document-store-timeout-seconds', 30) * 1000,
    searchSize: readInteger('search-size', 10),
  };
}
