/**
 * Opaque handles for credential tokens
 */

import * as core from '@actions/core';

/**
 * Wraps a credential so it never ends up in logs, reports or JSON output
 */
export class Secret {
  private readonly value: string;

  constructor(value: string) {
    this.value = value;
    if (value !== '') {
      core.setSecret(value);
    }
  }

  /**
   * Returns the raw credential. Call only when handing it to a subprocess.
   */
  reveal(): string {
    return this.value;
  }

  isEmpty(): boolean {
    return this.value === '';
  }

  toString(): string {
    return '***';
  }

  toJSON(): string {
    return '***';
  }
}

/**
 * Named secrets available to steps
 */
export type SecretStore = ReadonlyMap<string, Secret>;

/**
 * Builds the environment variables a step receives from its secret bindings
 *
 * @param bindings - Environment variable name to secret name
 * @param store - Available secrets
 * @returns Environment entries with revealed values
 * @throws Error if a bound secret is missing or empty
 */
export function resolveSecretEnv(
  bindings: Readonly<Record<string, string>> | undefined,
  store: SecretStore
): Record<string, string> {
  const env: Record<string, string> = {};
  if (!bindings) {
    return env;
  }

  for (const [variable, secretName] of Object.entries(bindings)) {
    const secret = store.get(secretName);
    if (!secret || secret.isEmpty()) {
      throw new Error(`Secret '${secretName}' is required but was not provided`);
    }
    env[variable] = secret.reveal();
  }

  return env;
}
