/**
 * Credential providers for the internal service identity.
 */

import { ConfigError } from '@switchyard/core';
import type { ICredentialProvider } from '@switchyard/core';

export const DEFAULT_PASSWORD_ENV = 'SWITCHYARD_MQ_PASSWORD';

/** Fixed password, mostly for tests and embedding. */
export class StaticCredentialProvider implements ICredentialProvider {
  readonly id = 'static';

  constructor(private readonly password: string) {}

  async getPassword(): Promise<string> {
    if (!this.password) {
      throw new ConfigError('Static credential provider has an empty password');
    }
    return this.password;
  }
}

/** Reads the password from an environment variable on every connect. */
export class EnvCredentialProvider implements ICredentialProvider {
  readonly id = 'env';

  constructor(private readonly variable: string = DEFAULT_PASSWORD_ENV) {}

  async getPassword(): Promise<string> {
    const password = process.env[this.variable];
    if (!password) {
      throw new ConfigError(`Environment variable ${this.variable} is not set`, {
        variable: this.variable,
      });
    }
    return password;
  }
}
