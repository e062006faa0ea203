import dayjs from 'dayjs';
import utc from 'dayjs/plugin/utc';
import { AttributeValue, DirectoryAttribute } from '@/types/directory.types';
import { FlagTable, PWD_FLAGS, UAC_FLAGS, parseFlags } from '@/utils/ldap-utils';
import { displayNameFromDn, sanitizeId } from './IdentityResolver';
import { DecoderOptions, RenderMode } from './types';

dayjs.extend(utc);

/**
 * Attribute Decoder
 *
 * Turns one attribute of one entry into display text. The HTML and flat-text
 * paths share a single decision table so every report format shows the same
 * decoding; they only differ in escaping and in how group links are drawn.
 */

// One tick is 100 ns
const TICK_SECONDS = 1e-7;

// Same layout as the C locale's "%x %X"
const TIMESTAMP_FORMAT = 'MM/DD/YY HH:mm:ss';

// Shown in place of a timestamp that cannot be represented
export const INVALID_TIMESTAMP = '0';

export function htmlEscape(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/'/g, '&#39;')
    .replace(/"/g, '&quot;');
}

/** Password ages: 100 ns ticks to days, sign ignored */
export function ticksToDays(ticks: number): number {
  return Math.abs(ticks) * TICK_SECONDS / 86400;
}

/** Lockout windows: 100 ns ticks to minutes, sign ignored */
export function ticksToMinutes(ticks: number): number {
  return Math.abs(ticks) * TICK_SECONDS / 60;
}

export function formatDays(ticks: number): string {
  return `${ticksToDays(ticks).toFixed(2)} days`;
}

export function formatMinutes(ticks: number): string {
  return `${ticksToMinutes(ticks).toFixed(1)} minutes`;
}

export function formatTimestamp(date: Date): string {
  if (isNaN(date.getTime())) {
    return INVALID_TIMESTAMP;
  }
  return dayjs.utc(date).format(TIMESTAMP_FORMAT);
}

/**
 * Natural string form of a single value
 */
export function formatValue(value: AttributeValue): string {
  switch (value.type) {
    case 'timestamp':
      return formatTimestamp(value.value);
    case 'integer':
      return String(value.value);
    case 'bytes':
      return value.value.toString('hex');
    case 'string':
      return value.value;
  }
}

// Integer content of an attribute, tolerating numeric strings
function integerOf(attribute: DirectoryAttribute): number | undefined {
  const [value] = attribute.values;
  if (value?.type === 'integer') {
    return value.value;
  }
  if (value?.type === 'string' && /^-?\d+$/.test(value.value.trim())) {
    return Number(value.value);
  }
  return undefined;
}

export class AttributeDecoder {
  private readonly options: DecoderOptions;

  constructor(options: Partial<DecoderOptions> = {}) {
    this.options = {
      usersByGroupFile: 'domain_users_by_group',
      ...options
    };
  }

  /**
   * Decode for the HTML report: escaped text, group DNs as links into the
   * users-by-group report
   */
  decodeHtml(attribute: DirectoryAttribute): string {
    return this.decode(attribute, 'html');
  }

  /**
   * Decode for flat text and structured data: unescaped text, group DNs as bare names
   */
  decodeFlat(attribute: DirectoryAttribute): string {
    return this.decode(attribute, 'flat');
  }

  /**
   * Anchor a group heading in the users-by-group report is reachable under
   */
  groupLink(cn: string): string {
    return `${this.options.usersByGroupFile}.html#cn_${encodeURIComponent(sanitizeId(cn))}`;
  }

  private decode(attribute: DirectoryAttribute, mode: RenderMode): string {
    const aname = attribute.name.toLowerCase();

    // User flags
    if (aname === 'useraccountcontrol') {
      const decoded = this.decodeFlags(attribute, UAC_FLAGS);
      if (decoded !== undefined) return decoded;
    }

    // List of groups
    if ((aname === 'member' || aname === 'memberof') && attribute.multiValued) {
      return this.decodeGroups(attribute, mode);
    }

    // Pwd flags
    if (aname === 'pwdproperties') {
      const decoded = this.decodeFlags(attribute, PWD_FLAGS);
      if (decoded !== undefined) return decoded;
    }

    if (aname === 'minpwdage' || aname === 'maxpwdage') {
      const ticks = integerOf(attribute);
      if (ticks !== undefined) return formatDays(ticks);
    }

    if (aname === 'lockoutobservationwindow' || aname === 'lockoutduration') {
      const ticks = integerOf(attribute);
      if (ticks !== undefined) return formatMinutes(ticks);
    }

    // Other
    const text = attribute.values.map(formatValue).map(v => (mode === 'html' ? htmlEscape(v) : v));
    return attribute.multiValued ? text.join(', ') : (text[0] ?? '');
  }

  private decodeFlags(attribute: DirectoryAttribute, flags: FlagTable): string | undefined {
    const value = integerOf(attribute);
    return value === undefined ? undefined : parseFlags(value, flags).join(', ');
  }

  private decodeGroups(attribute: DirectoryAttribute, mode: RenderMode): string {
    const outcache: string[] = [];
    for (const value of attribute.values) {
      const dn = formatValue(value);
      const cn = displayNameFromDn(dn);
      if (mode === 'html') {
        outcache.push(`<a href="${htmlEscape(this.groupLink(cn))}" title="${htmlEscape(dn)}">${htmlEscape(cn)}</a>`);
      } else {
        outcache.push(cn);
      }
    }
    return outcache.join(', ');
  }
}
