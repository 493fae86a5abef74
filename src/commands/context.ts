/**
 * Collaborators shared by every command
 */

import {ActionConfig} from '../config';
import {CredentialResolver, createCredentialResolver} from '../credentials';
import {DocumentStore, HttpDocumentStore} from '../documents';
import {SessionFactory, createSessionFactory} from '../redis';

export interface CommandContext {
  config: ActionConfig;
  openSession: SessionFactory;
  credentials: CredentialResolver;
  documents?: DocumentStore;
}

export function createCommandContext(config: ActionConfig): CommandContext {
  return {
    config,
    openSession: createSessionFactory(config.transport),
    credentials: createCredentialResolver({
      password: config.redisPassword,
      authSecretId: config.authSecretId,
      awsRegion: config.awsRegion,
    }),
    documents: config.documentStoreUrl
      ? new HttpDocumentStore({
          endpoint: config.documentStoreUrl,
          index: config.documentIndex,
          token: config.documentStoreToken,
          timeoutMs: config.documentStoreTimeoutMs,
        })
      : undefined,
  };
}
