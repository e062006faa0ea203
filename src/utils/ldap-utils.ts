/**
 * LDAP Utility Functions
 * Filters, attribute tables and wire-value conversions shared by the directory
 * service and the report pipeline
 */

// LDAP Filter Constants
export const LDAP_FILTERS = {
  ALL_USERS: '(&(objectCategory=person)(objectClass=user))',
  COMPUTERS: '(objectClass=computer)',
  GROUPS: '(objectClass=group)',
  DOMAIN: '(objectClass=domain)',
  DOMAIN_POLICY: '(cn=Builtin)',
  // groupType has the security-enabled bit (0x80000000) set
  SECURITY_GROUPS: '(groupType:1.2.840.113556.1.4.803:=2147483648)'
} as const;

// Well-known relative identifier of the Domain Admins group
export const DOMAIN_ADMINS_RID = 512;

// User Account Control flags, in decoding order
export const UAC_FLAGS = Object.freeze({
  ACCOUNT_DISABLED: 0x00000002,
  ACCOUNT_LOCKED: 0x00000010,
  PASSWD_NOTREQD: 0x00000020,
  PASSWD_CANT_CHANGE: 0x00000040,
  NORMAL_ACCOUNT: 0x00000200,
  WORKSTATION_ACCOUNT: 0x00001000,
  SERVER_TRUST_ACCOUNT: 0x00002000,
  DONT_EXPIRE_PASSWD: 0x00010000,
  SMARTCARD_REQUIRED: 0x00040000,
  PASSWORD_EXPIRED: 0x00800000
} as const);

// Domain password policy flags (pwdProperties), in decoding order
export const PWD_FLAGS = Object.freeze({
  PASSWORD_COMPLEX: 0x01,
  PASSWORD_NO_ANON_CHANGE: 0x02,
  PASSWORD_NO_CLEAR_CHANGE: 0x04,
  LOCKOUT_ADMINS: 0x08,
  PASSWORD_STORE_CLEARTEXT: 0x10,
  REFUSE_PASSWORD_CHANGE: 0x20
} as const);

export type FlagTable = Readonly<Record<string, number>>;

// Column headings for attributes that have a friendlier name
export const ATTRIBUTE_TRANSLATIONS: Readonly<Record<string, string>> = Object.freeze({
  sAMAccountName: 'SAM Name',
  cn: 'CN',
  operatingSystem: 'Operating System',
  operatingSystemServicePack: 'Service Pack',
  operatingSystemVersion: 'OS Version',
  userAccountControl: 'Flags',
  objectSid: 'SID',
  memberOf: 'Member of groups',
  dNSHostName: 'DNS Hostname',
  whenCreated: 'Created on',
  whenChanged: 'Changed on',
  IPv4: 'IPv4 Address',
  lockOutObservationWindow: 'Lockout time window',
  lockoutDuration: 'Lockout Duration',
  lockoutThreshold: 'Lockout Threshold',
  maxPwdAge: 'Max password age',
  minPwdAge: 'Min password age',
  minPwdLength: 'Min password length'
});

// Attribute syntax tables. Lookups go through lowerCaseSet() so casing on the wire does not matter.
export const INTEGER_ATTRIBUTES = [
  'adminCount', 'badPwdCount', 'codePage', 'countryCode', 'forceLogoff', 'groupType',
  'instanceType', 'lockOutObservationWindow', 'lockoutDuration', 'lockoutThreshold',
  'logonCount', 'maxPwdAge', 'minPwdAge', 'minPwdLength', 'ms-DS-MachineAccountQuota',
  'msDS-Behavior-Version', 'msDS-SupportedEncryptionTypes', 'nextRid', 'primaryGroupID',
  'pwdHistoryLength', 'pwdProperties', 'sAMAccountType', 'serverState', 'systemFlags',
  'uASCompat', 'userAccountControl', 'uSNChanged', 'uSNCreated'
] as const;

// 100-nanosecond intervals since 1601-01-01 UTC
export const FILETIME_ATTRIBUTES = [
  'accountExpires', 'badPasswordTime', 'creationTime', 'lastLogoff', 'lastLogon',
  'lastLogonTimestamp', 'lockoutTime', 'pwdLastSet'
] as const;

// Generalized time, e.g. 20240115134500.0Z
export const GENERALIZED_TIME_ATTRIBUTES = [
  'dSCorePropagationData', 'whenChanged', 'whenCreated'
] as const;

export const SID_ATTRIBUTES = ['mS-DS-CreatorSID', 'objectSid', 'securityIdentifier', 'sIDHistory'] as const;

export const GUID_ATTRIBUTES = ['msExchMailboxGuid', 'objectGUID'] as const;

// Requested as buffers from the server; SIDs and GUIDs are turned into strings afterwards
export const BINARY_ATTRIBUTES = [
  ...SID_ATTRIBUTES,
  ...GUID_ATTRIBUTES,
  'auditingPolicy', 'cACertificate', 'jpegPhoto', 'logonHours',
  'msDS-AllowedToActOnBehalfOfOtherIdentity', 'msDS-GenerationId',
  'msExchMailboxSecurityDescriptor', 'nTSecurityDescriptor', 'replUpToDateVector',
  'repsFrom', 'repsTo', 'thumbnailPhoto', 'userCertificate'
] as const;

// Always read as lists, even when the server sends a single value
export const MULTI_VALUED_ATTRIBUTES = [
  'dSCorePropagationData', 'directReports', 'masteredBy', 'member', 'memberOf',
  'msDS-AllowedToDelegateTo', 'objectClass', 'otherWellKnownObjects', 'proxyAddresses',
  'repsFrom', 'repsTo', 'servicePrincipalName', 'sIDHistory', 'userCertificate',
  'wellKnownObjects'
] as const;

export function lowerCaseSet(names: readonly string[]): ReadonlySet<string> {
  return new Set(names.map(name => name.toLowerCase()));
}

/**
 * Names of the flags whose whole mask is contained in `value`, in table order
 */
export function parseFlags(value: number, flags: FlagTable): string[] {
  const outflags: string[] = [];
  for (const [flag, mask] of Object.entries(flags)) {
    if ((value & mask) === mask) {
      outflags.push(flag);
    }
  }
  return outflags;
}

/**
 * Escape a value for use inside an LDAP search filter
 */
export function escapeFilterValue(value: string): string {
  return value
    .replace(/\\/g, '\\5c')
    .replace(/\*/g, '\\2a')
    .replace(/\(/g, '\\28')
    .replace(/\)/g, '\\29')
    .replace(/\0/g, '\\00');
}

// "Never" marker used by accountExpires and friends
const FILETIME_NEVER = 9223372036854775807n;

/**
 * Convert Windows FileTime to JavaScript Date
 * Returns null for 0, for the "never" marker and for stamps a Date cannot hold
 */
export function windowsFileTimeToDate(fileTime: string | number): Date | null {
  if (!fileTime || fileTime === '0') return null;

  let fileTimeBigInt: bigint;
  try {
    fileTimeBigInt = BigInt(fileTime);
  } catch {
    return null;
  }
  if (fileTimeBigInt <= 0n || fileTimeBigInt >= FILETIME_NEVER) return null;

  // Convert Windows FileTime to JavaScript timestamp
  const EPOCH_DIFFERENCE = 116444736000000000n;
  const jsTimeBigInt = fileTimeBigInt - EPOCH_DIFFERENCE;
  const jsTime = Number(jsTimeBigInt / 10000n); // Convert from 100-nanosecond to milliseconds
  const date = new Date(jsTime);
  return isNaN(date.getTime()) ? null : date;
}

/**
 * Parse LDAP generalized time (YYYYMMDDHHmmss[.f]Z) to a UTC Date
 */
export function ldapTimestampToDate(timestamp: string): Date | null {
  const match = /^(\d{4})(\d{2})(\d{2})(\d{2})(\d{2})(\d{2})/.exec(timestamp);
  if (!match) return null;

  const [year, month, day, hour, minute, second] = match.slice(1).map(part => parseInt(part, 10));
  return new Date(Date.UTC(year, month - 1, day, hour, minute, second));
}

/**
 * Convert a binary security identifier to its S-R-I-S-S... string form
 */
export function sidBufferToString(buffer: Buffer): string | null {
  if (buffer.length < 8) return null;

  const revision = buffer.readUInt8(0);
  const subAuthorityCount = buffer.readUInt8(1);
  if (buffer.length < 8 + subAuthorityCount * 4) return null;

  const authority = buffer.readUIntBE(2, 6);
  const parts = [`S-${revision}-${authority}`];
  for (let i = 0; i < subAuthorityCount; i++) {
    parts.push(String(buffer.readUInt32LE(8 + i * 4)));
  }
  return parts.join('-');
}

/**
 * Convert a binary GUID (mixed-endian) to its canonical string form
 */
export function guidBufferToString(buffer: Buffer): string | null {
  if (buffer.length !== 16) return null;

  const hex = (start: number, end: number, reverse: boolean): string => {
    const bytes = [...buffer.subarray(start, end)];
    return (reverse ? bytes.reverse() : bytes).map(b => b.toString(16).padStart(2, '0')).join('');
  };
  return [
    hex(0, 4, true),
    hex(4, 6, true),
    hex(6, 8, true),
    hex(8, 10, false),
    hex(10, 16, false)
  ].join('-');
}

/**
 * Build an LDAP URL from a bare host name; URLs are returned as-is
 */
export function formatLdapUrl(server: string, useLDAPS: boolean): string {
  if (server.startsWith('ldap://') || server.startsWith('ldaps://')) {
    return server;
  }
  const port = useLDAPS ? 636 : 389;
  const protocol = useLDAPS ? 'ldaps' : 'ldap';
  return `${protocol}://${server}:${port}`;
}
