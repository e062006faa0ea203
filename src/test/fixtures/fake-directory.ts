import { DirectoryConnection, LDAPSearchOptions, LDAPSearchResult } from '@/config/ldap';
import { DOMAIN_DN } from './entries';

/**
 * In-process stand-in for an LDAP session. Results are served by filter.
 */
export class FakeDirectoryConnection implements DirectoryConnection {
  bound = false;
  closed = false;
  searches: Array<{ baseDN: string; options: LDAPSearchOptions }> = [];
  failOn: { bind?: Error; filter?: string; error?: Error } = {};

  constructor(
    private results: Record<string, LDAPSearchResult[]> = {},
    private namingContext = DOMAIN_DN
  ) {}

  respond(filter: string, results: LDAPSearchResult[]): this {
    this.results[filter] = results;
    return this;
  }

  async bind(): Promise<void> {
    if (this.failOn.bind) throw this.failOn.bind;
    this.bound = true;
  }

  async getNamingContext(): Promise<string> {
    return this.namingContext;
  }

  async search(baseDN: string, options: LDAPSearchOptions): Promise<LDAPSearchResult[]> {
    this.searches.push({ baseDN, options });
    if (this.failOn.error && this.failOn.filter === options.filter) {
      throw this.failOn.error;
    }
    return this.results[options.filter] ?? [];
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

/**
 * Binary SID in the layout a directory server sends
 */
export function sidBuffer(sid: string): Buffer {
  const [, revision, authority, ...subAuthorities] = sid.split('-');
  const buffer = Buffer.alloc(8 + subAuthorities.length * 4);
  buffer.writeUInt8(Number(revision), 0);
  buffer.writeUInt8(subAuthorities.length, 1);
  buffer.writeUIntBE(Number(authority), 2, 6);
  subAuthorities.forEach((part, i) => buffer.writeUInt32LE(Number(part), 8 + i * 4));
  return buffer;
}
