import { logger } from '@/utils/logger';
import { DirectoryConnection, LDAPSearchResult, RawAttributeValue } from '@/config/ldap';
import {
  AttributeValue,
  DirectoryAttribute,
  DirectoryEntry,
  bytesValue,
  integerValue,
  stringValue,
  timestampValue
} from '@/types/directory.types';
import {
  DOMAIN_ADMINS_RID,
  FILETIME_ATTRIBUTES,
  GENERALIZED_TIME_ATTRIBUTES,
  GUID_ATTRIBUTES,
  INTEGER_ATTRIBUTES,
  LDAP_FILTERS,
  MULTI_VALUED_ATTRIBUTES,
  SID_ATTRIBUTES,
  escapeFilterValue,
  guidBufferToString,
  ldapTimestampToDate,
  lowerCaseSet,
  sidBufferToString,
  windowsFileTimeToDate
} from '@/utils/ldap-utils';

const INTEGERS = lowerCaseSet(INTEGER_ATTRIBUTES);
const FILETIMES = lowerCaseSet(FILETIME_ATTRIBUTES);
const GENERALIZED_TIMES = lowerCaseSet(GENERALIZED_TIME_ATTRIBUTES);
const SIDS = lowerCaseSet(SID_ATTRIBUTES);
const GUIDS = lowerCaseSet(GUID_ATTRIBUTES);
const MULTI_VALUED = lowerCaseSet(MULTI_VALUED_ATTRIBUTES);

// Date(NaN) marks a stamp that is unset or out of range; it renders as "0"
const UNSET_TIMESTAMP = timestampValue(new Date(NaN));

function convertValue(name: string, raw: string | Buffer): AttributeValue {
  if (Buffer.isBuffer(raw)) {
    if (SIDS.has(name)) {
      const sid = sidBufferToString(raw);
      return sid === null ? bytesValue(raw) : stringValue(sid);
    }
    if (GUIDS.has(name)) {
      const guid = guidBufferToString(raw);
      return guid === null ? bytesValue(raw) : stringValue(guid);
    }
    return bytesValue(raw);
  }

  if (INTEGERS.has(name) && /^-?\d+$/.test(raw)) {
    return integerValue(Number(raw));
  }
  if (FILETIMES.has(name)) {
    const date = windowsFileTimeToDate(raw);
    return date ? timestampValue(date) : UNSET_TIMESTAMP;
  }
  if (GENERALIZED_TIMES.has(name)) {
    const date = ldapTimestampToDate(raw);
    return date ? timestampValue(date) : UNSET_TIMESTAMP;
  }
  return stringValue(raw);
}

function convertAttribute(name: string, raw: RawAttributeValue): DirectoryAttribute | null {
  const key = name.toLowerCase();
  const values: Array<string | Buffer> = Array.isArray(raw) ? raw : [raw];
  if (values.length === 0) return null;

  return {
    name,
    values: values.map(value => convertValue(key, value)),
    multiValued: MULTI_VALUED.has(key) || values.length > 1
  };
}

/**
 * Convert a search result into a typed entry. Attribute syntax is decided by
 * name, so the same attribute decodes the same way on every entry.
 */
export function toDirectoryEntry(result: LDAPSearchResult): DirectoryEntry {
  const entry = new DirectoryEntry(result.dn);
  for (const [name, raw] of Object.entries(result.attributes)) {
    const attribute = convertAttribute(name, raw);
    if (attribute) {
      entry.set(attribute);
    }
  }
  return entry;
}

/**
 * Account name for a sAMAccountName lookup: DOMAIN\user becomes user
 */
export function accountName(username: string): string {
  const slash = username.indexOf('\\');
  return slash === -1 ? username : username.slice(slash + 1);
}

/**
 * Directory Service
 * Every query of the dump, run against the naming context of the bound session
 */
export class DirectoryService {
  private logger = logger.child({ service: 'DirectoryService' });
  private root: string | null;
  private connected = false;

  constructor(private connection: DirectoryConnection, baseDN?: string) {
    this.root = baseDN ?? null;
  }

  /**
   * Bind and settle the naming context every query searches under.
   * Calling it again on a bound session does nothing.
   */
  async connect(): Promise<string> {
    if (!this.connected) {
      await this.connection.bind();
      this.connected = true;
    }
    if (this.root === null) {
      this.root = await this.connection.getNamingContext();
      this.logger.debug(`Using naming context ${this.root}`);
    }
    return this.root;
  }

  async close(): Promise<void> {
    this.connected = false;
    await this.connection.close();
  }

  getAllUsers(): Promise<DirectoryEntry[]> {
    return this.searchAll(LDAP_FILTERS.ALL_USERS);
  }

  getAllComputers(): Promise<DirectoryEntry[]> {
    return this.searchAll(LDAP_FILTERS.COMPUTERS);
  }

  getAllGroups(): Promise<DirectoryEntry[]> {
    return this.searchAll(LDAP_FILTERS.GROUPS);
  }

  getDomainPolicy(): Promise<DirectoryEntry[]> {
    return this.searchAll(LDAP_FILTERS.DOMAIN_POLICY);
  }

  getAllSecurityGroups(): Promise<DirectoryEntry[]> {
    return this.searchAll(LDAP_FILTERS.SECURITY_GROUPS);
  }

  /**
   * SID of the domain object, or null when the directory does not expose it
   */
  async getRootSid(): Promise<string | null> {
    const [domain] = await this.searchAll(LDAP_FILTERS.DOMAIN, ['objectSid']);
    return domain?.getString('objectSid') ?? null;
  }

  /**
   * The group whose SID is the domain SID plus the Domain Admins RID
   */
  async getDomainAdminsGroup(domainSid: string): Promise<DirectoryEntry | null> {
    const [group] = await this.searchAll(
      `(objectSid=${escapeFilterValue(`${domainSid}-${DOMAIN_ADMINS_RID}`)})`,
      ['distinguishedName', 'cn']
    );
    return group ?? null;
  }

  /**
   * memberOf DNs of a user; empty for a user that is only in its primary group
   */
  async getUserGroups(username: string): Promise<string[]> {
    const name = escapeFilterValue(accountName(username));
    const filter = username.includes('@')
      ? `(&${LDAP_FILTERS.ALL_USERS}(|(sAMAccountName=${name})(userPrincipalName=${name})))`
      : `(&${LDAP_FILTERS.ALL_USERS}(sAMAccountName=${name}))`;

    const [user] = await this.searchAll(filter, ['memberOf']);
    return user?.getStrings('memberOf') ?? [];
  }

  /**
   * Whether a user is a direct member of Administrators or Domain Admins
   */
  async isDomainAdmin(username: string): Promise<boolean> {
    const groups = await this.getUserGroups(username);
    const domainSid = await this.getRootSid();
    const adminGroup = domainSid === null ? null : await this.getDomainAdminsGroup(domainSid);
    const adminDn = adminGroup?.dn;

    return groups.some(group =>
      group.includes('CN=Administrators') ||
      group.includes('CN=Domain Admins') ||
      group === adminDn
    );
  }

  private async searchAll(filter: string, attributes: string[] = []): Promise<DirectoryEntry[]> {
    if (this.root === null) {
      throw new Error('Directory service is not connected. Call connect() first.');
    }

    const results = await this.connection.search(this.root, { filter, scope: 'sub', attributes });
    this.logger.debug(`${filter} returned ${results.length} entries`);
    return results.map(toDirectoryEntry);
  }
}
