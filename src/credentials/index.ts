/**
 * Credentials module - AUTH token resolution
 *
 * A secret reference takes precedence over a directly supplied token.
 */

import {AwsSecretSource} from './aws';
import {SecretCredentialResolver, StaticCredentialResolver} from './resolver';
import {CredentialResolver, SecretSource} from './types';

export * from './types';
export * from './resolver';
export * from './aws';

export interface CredentialSettings {
  password?: string;
  authSecretId?: string;
  awsRegion?: string;
}

export function createCredentialResolver(
  settings: CredentialSettings,
  source?: SecretSource
): CredentialResolver {
  if (settings.authSecretId) {
    return new SecretCredentialResolver(
      source ?? new AwsSecretSource(settings.awsRegion),
      settings.authSecretId
    );
  }
  return new StaticCredentialResolver(settings.password);
}
