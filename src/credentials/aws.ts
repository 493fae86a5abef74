/**
 * AWS Secrets Manager backed secret source
 */

import {
  GetSecretValueCommand,
  SecretsManagerClient,
} from '@aws-sdk/client-secrets-manager';
import {SecretSource} from './types';

export class AwsSecretSource implements SecretSource {
  private readonly client: SecretsManagerClient;

  constructor(region?: string) {
    this.client = new SecretsManagerClient(region ? {region} : {});
  }

  async getSecretString(secretId: string): Promise<string | undefined> {
    const response = await this.client.send(
      new GetSecretValueCommand({SecretId: secretId})
    );
    return response.SecretString;
  }
}
