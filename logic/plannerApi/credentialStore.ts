/**
 * Keyed store of planner credentials (entry id -> Credentials)
 *
 * The persisted copy lives in Homey device settings. This store mirrors it
 * at runtime so several configured systems stay isolated from each other.
 */
import type { Credentials } from './types';

export class CredentialStore {
  private readonly entries = new Map<string, Readonly<Credentials>>();

  set(entryId: string, credentials: Credentials): void {
    this.entries.set(entryId, Object.freeze({ ...credentials }));
  }

  get(entryId: string): Readonly<Credentials> | undefined {
    return this.entries.get(entryId);
  }

  delete(entryId: string): boolean {
    return this.entries.delete(entryId);
  }
}
