/**
 * ICredentialProvider: source of the bus password for the internal
 * service identity. Read once per connect; never consulted by a live session.
 */

export interface ICredentialProvider {
  readonly id: string;

  getPassword(): Promise<string>;
}
