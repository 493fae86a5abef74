import {ActionConfig} from '../../config';

export function actionConfigFor(
  overrides: Partial<ActionConfig> = {}
): ActionConfig {
  return {
    command: 'health',
    transport: {
      host: '127.0.0.1',
      port: 6379,
      tls: false,
      insecureTransport: false,
      connectTimeoutMs: 1000,
      commandTimeoutMs: 1000,
    },
    recordPatterns: '',
    recordId: '',
    query: '',
    documentIndex: 'user-events',
    documentStoreTimeoutMs: 30000,
    searchSize: 10,
    ...overrides,
  };
}
