/**
 * AUTH token resolution
 */

import * as core from '@actions/core';
import {CredentialResolver, SecretSource} from './types';

export const AUTH_TOKEN_FIELD = 'auth-token';

/**
 * Token supplied directly (e.g. from a repository secret input)
 */
export class StaticCredentialResolver implements CredentialResolver {
  private readonly token: string | undefined;

  constructor(token?: string) {
    this.token = token ? token : undefined;
  }

  async resolveToken(): Promise<string | undefined> {
    return this.token;
  }
}

/**
 * Token stored as the `auth-token` field of a JSON secret.
 * The secret is fetched again on every call.
 */
export class SecretCredentialResolver implements CredentialResolver {
  constructor(
    private readonly source: SecretSource,
    private readonly secretId: string
  ) {}

  async resolveToken(): Promise<string> {
    core.debug(`[credentials] Fetching AUTH token from secret ${this.secretId}`);

    const secretString = await this.source.getSecretString(this.secretId);
    if (secretString === undefined) {
      throw new Error(`Secret ${this.secretId} has no string value`);
    }

    let secret: unknown;
    try {
      secret = JSON.parse(secretString);
    } catch {
      throw new Error(`Secret ${this.secretId} is not valid JSON`);
    }

    const fields: Array<[string, unknown]> =
      typeof secret === 'object' && secret !== null ? Object.entries(secret) : [];
    const token = fields.find(([key]) => key === AUTH_TOKEN_FIELD)?.[1];

    if (typeof token !== 'string' || token.length === 0) {
      throw new Error(
        `Secret ${this.secretId} has no "${AUTH_TOKEN_FIELD}" field`
      );
    }

    core.setSecret(token);
    return token;
  }
}
