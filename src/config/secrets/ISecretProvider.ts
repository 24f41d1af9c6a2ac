/**
 * Secret Provider Interface
 *
 * Providers resolve logical secret names (e.g., "STOREFRONT_API_KEY") from a
 * source such as mounted files or environment variables. SecretResolver
 * tries them in order until one returns a value.
 */

export interface ISecretProvider {
  /**
   * @param logicalName - The logical name of the secret
   * @returns The secret, or undefined if this provider does not have it
   * @throws Error only for unexpected failures (permission denied, I/O errors).
   *         Do NOT throw for "secret not found" - return undefined instead
   */
  resolve(logicalName: string): Promise<string | undefined>;
}

export function isSecretProvider(obj: unknown): obj is ISecretProvider {
  return (
    typeof obj === 'object' &&
    obj !== null &&
    'resolve' in obj &&
    typeof obj.resolve === 'function'
  );
}
