/**
 * Directory service (LDAP) binds and searches, backed by ldapts
 */

import { Client, EqualityFilter, InvalidCredentialsError } from "ldapts";
import { ERROR_CODES, withContext } from "@capbridge/shared";

export interface DirectoryConnection {
  /** false when the server rejects the credentials */
  bind(dn: string, password: string): Promise<boolean>;
  /** DNs of entries under baseDn whose attribute equals value */
  search(baseDn: string, attribute: string, value: string): Promise<string[]>;
  close(): Promise<void>;
}

export type DirectoryConnector = (url: string) => DirectoryConnection;

export interface LdaptsConnectorOptions {
  timeoutMs: number;
}

export function createLdaptsConnector(options: LdaptsConnectorOptions): DirectoryConnector {
  return (url) => new LdaptsConnection(
    new Client({ url, timeout: options.timeoutMs, connectTimeout: options.timeoutMs })
  );
}

class LdaptsConnection implements DirectoryConnection {
  constructor(private client: Client) {}

  async bind(dn: string, password: string): Promise<boolean> {
    try {
      await this.client.bind(dn, password);
      return true;
    } catch (error) {
      if (error instanceof InvalidCredentialsError) {
        return false;
      }
      throw error;
    }
  }

  async search(baseDn: string, attribute: string, value: string): Promise<string[]> {
    const { searchEntries } = await this.client.search(baseDn, {
      scope: "sub",
      filter: new EqualityFilter({ attribute, value }),
      attributes: ["dn"],
    });
    return searchEntries.map((entry) => entry.dn);
  }

  async close(): Promise<void> {
    if (this.client.isConnected) {
      await this.client.unbind();
    }
  }
}

export type SearchBindOutcome =
  | { kind: "authenticated"; dn: string }
  | { kind: "rejected"; dn: string }
  | { kind: "not-found" }
  | { kind: "search-user-rejected" };

export class DirectoryService {
  constructor(private connect: DirectoryConnector) {}

  /**
   * Simple bind. Rejected credentials resolve to false; connection and
   * protocol faults reject.
   */
  async bind(url: string, dn: string, password: string): Promise<boolean> {
    const connection = this.connect(url);
    try {
      return await this.step("fatal error during simple_bind", () => connection.bind(dn, password));
    } finally {
      await connection.close();
    }
  }

  /**
   * Bind as a search user, find the entry with uid=user under baseDn, then
   * bind as the first match. No match means no further bind.
   */
  async searchBind(
    url: string,
    searchUser: string,
    searchPassword: string,
    baseDn: string,
    user: string,
    password: string
  ): Promise<SearchBindOutcome> {
    const connection = this.connect(url);
    try {
      const searchBound = await this.step("fatal error during simple_bind with search user", () =>
        connection.bind(searchUser, searchPassword)
      );
      if (!searchBound) {
        return { kind: "search-user-rejected" };
      }

      const entries = await this.step("fatal error during ldap search", () =>
        connection.search(baseDn, "uid", user)
      );
      const dn = entries[0];
      if (dn === undefined) {
        return { kind: "not-found" };
      }

      const bound = await this.step("fatal error during simple_bind", () => connection.bind(dn, password));
      return bound ? { kind: "authenticated", dn } : { kind: "rejected", dn };
    } finally {
      await connection.close();
    }
  }

  private async step<T>(context: string, action: () => Promise<T>): Promise<T> {
    try {
      return await action();
    } catch (error) {
      throw withContext(ERROR_CODES.DIRECTORY, context, error);
    }
  }
}

/**
 * Escape a value for use inside a distinguished name (RFC 4514)
 */
export function escapeDnValue(value: string): string {
  let out = "";
  for (let index = 0; index < value.length; index++) {
    const char = value[index];
    const leading = index === 0 && (char === " " || char === "#");
    const trailing = index === value.length - 1 && char === " ";

    if (char === "\0") {
      out += "\\00";
    } else if (leading || trailing || ',+"\\<>;='.includes(char)) {
      out += `\\${char}`;
    } else {
      out += char;
    }
  }
  return out;
}
