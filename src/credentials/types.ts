/**
 * Credential module types and interfaces
 */

export interface CredentialResolver {
  /**
   * Resolve the AUTH token for one operation.
   * `undefined` means no authentication is configured; failures throw.
   */
  resolveToken(): Promise<string | undefined>;
}

/**
 * Raw access to a secret store
 */
export interface SecretSource {
  getSecretString(secretId: string): Promise<string | undefined>;
}
