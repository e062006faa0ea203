import { AttributeValue, DirectoryEntry } from '@/types/directory.types';
import { InvalidDnError, MalformedSidError } from '@/services/base/errors';

/**
 * Identity Resolver
 *
 * Derives display names for directory objects: from a distinguished name (the
 * first RDN value, which by directory naming convention is the object's common
 * name) or from the relative identifier at the end of a group's SID.
 */

// Characters that are escaped with a leading backslash inside an RDN value
export const DN_SPECIAL_CHARACTERS = [' ', '"', '#', '+', ',', ';', '<', '=', '>', '\\', '\0'] as const;

const DN_SPECIAL_SET: ReadonlySet<string> = new Set(DN_SPECIAL_CHARACTERS);

/**
 * Turn a name into something usable as an HTML id: every run of characters
 * outside [A-Za-z0-9_-] becomes a single underscore
 */
export function sanitizeId(name: string): string {
  return name.replace(/[^a-zA-Z0-9_-]+/g, '_');
}

export function escapeDnComponent(value: string): string {
  let out = '';
  for (const ch of value) {
    out += DN_SPECIAL_SET.has(ch) ? `\\${ch}` : ch;
  }
  return out;
}

/**
 * Reverse RDN value escaping: `\c` for a special character, `\XX` for a hex
 * encoded UTF-8 byte
 */
export function unescapeDnComponent(value: string): string {
  let out = '';
  let pendingBytes: number[] = [];

  const flushBytes = (): void => {
    if (pendingBytes.length > 0) {
      out += Buffer.from(pendingBytes).toString('utf8');
      pendingBytes = [];
    }
  };

  for (let i = 0; i < value.length; i++) {
    const ch = value[i];
    if (ch === '\\' && i + 1 < value.length) {
      const next = value[i + 1];
      if (DN_SPECIAL_SET.has(next)) {
        flushBytes();
        out += next;
        i++;
        continue;
      }
      const hex = value.slice(i + 1, i + 3);
      if (/^[0-9a-fA-F]{2}$/.test(hex)) {
        pendingBytes.push(parseInt(hex, 16));
        i += 2;
        continue;
      }
    }
    flushBytes();
    out += ch;
  }
  flushBytes();
  return out;
}

/**
 * Split on a separator that is not escaped. Escape pairs are kept verbatim.
 */
function splitUnescaped(input: string, separator: string): string[] {
  const parts: string[] = [];
  let current = '';
  for (let i = 0; i < input.length; i++) {
    const ch = input[i];
    if (ch === '\\' && i + 1 < input.length) {
      current += ch + input[i + 1];
      i++;
    } else if (ch === separator) {
      parts.push(current);
      current = '';
    } else {
      current += ch;
    }
  }
  parts.push(current);
  return parts;
}

// Drop trailing spaces unless the last one is escaped
function trimUnescapedEnd(raw: string): string {
  let end = raw.length;
  while (end > 0 && raw[end - 1] === ' ') {
    let backslashes = 0;
    for (let i = end - 2; i >= 0 && raw[i] === '\\'; i--) backslashes++;
    if (backslashes % 2 === 1) break;
    end--;
  }
  return raw.slice(0, end);
}

/**
 * Parse a DN into its RDN components as [type, raw value] pairs. Multi-valued
 * RDNs (joined with '+') contribute their first attribute only.
 */
export function parseDn(dn: string): Array<[string, string]> {
  if (dn.trim() === '') {
    throw new InvalidDnError(dn);
  }
  return splitUnescaped(dn, ',').map(rdn => {
    const [ava] = splitUnescaped(rdn, '+');
    const eq = ava.indexOf('=');
    if (eq <= 0) {
      throw new InvalidDnError(dn);
    }
    return [ava.slice(0, eq).trim(), trimUnescapedEnd(ava.slice(eq + 1).replace(/^ +/, ''))];
  });
}

/**
 * Common name of an object from its DN: the first RDN value, unescaped
 */
export function cnFromDn(dn: string): string {
  const [[, value]] = parseDn(dn);
  return unescapeDnComponent(value);
}

/**
 * Like cnFromDn, but falls back to the DN itself when it cannot be parsed
 */
export function displayNameFromDn(dn: string): string {
  try {
    return cnFromDn(dn);
  } catch (error) {
    if (error instanceof InvalidDnError) {
      return dn;
    }
    throw error;
  }
}

/**
 * Relative identifier: the last dash-separated token of a SID, as a
 * non-negative integer. Undefined when that token is not a number.
 */
export function ridFromSid(sid: string): number | undefined {
  const tokens = sid.split('-');
  const last = tokens[tokens.length - 1];
  if (!/^\d+$/.test(last)) {
    return undefined;
  }
  const rid = Number(last);
  return Number.isSafeInteger(rid) ? rid : undefined;
}

// SID as shown in a fault; bytes that did not parse as a SID are shown as hex
function sidText(value: AttributeValue | undefined): string | undefined {
  if (value === undefined) {
    return undefined;
  }
  switch (value.type) {
    case 'string':
      return value.value;
    case 'bytes':
      return `0x${value.value.toString('hex')}`;
    case 'integer':
    case 'timestamp':
      return String(value.value);
  }
}

export interface RidMap {
  map: Map<number, string>;
  faults: MalformedSidError[];
}

/**
 * Map every group's RID to its display name. Groups whose SID is missing or
 * malformed are left out and returned as faults for the caller to report.
 */
export function buildRidToNameMap(groups: readonly DirectoryEntry[]): RidMap {
  const map = new Map<number, string>();
  const faults: MalformedSidError[] = [];

  for (const group of groups) {
    const value = group.first('objectSid');
    const rid = value?.type === 'string' ? ridFromSid(value.value) : undefined;
    if (rid === undefined) {
      faults.push(new MalformedSidError(group.dn, sidText(value)));
      continue;
    }
    map.set(rid, group.getString('cn') ?? displayNameFromDn(group.dn));
  }

  return { map, faults };
}
