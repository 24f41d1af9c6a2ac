/**
 * Secret Management Module
 *
 * Resolves {"$secret": "NAME"} descriptors in configuration files so that
 * API keys and signing secrets never live in the file itself.
 */

export type { ISecretProvider } from './ISecretProvider.js';
export { isSecretProvider } from './ISecretProvider.js';
export { SecretResolver, type SecretResolverConfig } from './SecretResolver.js';

export { FileSecretProvider } from './providers/FileSecretProvider.js';
export { EnvProvider } from './providers/EnvProvider.js';
