/**
 * Domain model for directory users.
 *
 * `teams` holds team machine names; the directory is authoritative for it.
 */
import { firstValue, type DirectoryEntry } from './directory-entry.model';

export interface User {
  uid: string;
  givenName: string;
  surname: string;
  mail: string | null;
  teams: string[];
  dn: string | null;
}

export interface UserCreateInput {
  uid: string;
  givenName: string;
  surname: string;
  mail?: string | null;
}

export function decodeUser(entry: DirectoryEntry, teams: string[] = []): User {
  const uid = firstValue(entry, 'uid');
  if (uid === null) {
    throw new Error(`Directory entry ${entry.dn} has no uid attribute`);
  }
  return {
    uid,
    givenName: firstValue(entry, 'givenName') ?? '',
    surname: firstValue(entry, 'sn') ?? '',
    mail: firstValue(entry, 'mail'),
    teams,
    dn: entry.dn,
  };
}
