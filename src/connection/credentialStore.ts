import { access, rm } from 'node:fs/promises';

/** Persisted authorization material. Only existence and removal are visible here. */
export interface CredentialStore {
  exists(): Promise<boolean>;
  delete(): Promise<void>;
}

export class FileCredentialStore implements CredentialStore {
  public constructor(public readonly filePath: string) {}

  public async exists(): Promise<boolean> {
    try {
      await access(this.filePath);
      return true;
    } catch {
      return false;
    }
  }

  public async delete(): Promise<void> {
    await rm(this.filePath, { force: true });
  }
}
