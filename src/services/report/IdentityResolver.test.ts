import {
  DN_SPECIAL_CHARACTERS,
  buildRidToNameMap,
  cnFromDn,
  displayNameFromDn,
  escapeDnComponent,
  parseDn,
  ridFromSid,
  sanitizeId,
  unescapeDnComponent
} from './IdentityResolver';
import { InvalidDnError, MalformedSidError } from '@/services/base/errors';
import { DOMAIN_DN, DOMAIN_SID, makeEntry, makeGroup } from '@/test/fixtures/entries';

describe('IdentityResolver', () => {
  describe('sanitizeId', () => {
    it('should collapse every run of other characters into one underscore', () => {
      expect(sanitizeId('Domain Admins')).toBe('Domain_Admins');
      expect(sanitizeId('a  b!!c')).toBe('a_b_c');
      expect(sanitizeId('Group (Test)')).toBe('Group_Test_');
    });

    it('should keep letters, digits, dashes and underscores', () => {
      expect(sanitizeId('Print-Operators_2')).toBe('Print-Operators_2');
    });
  });

  describe('DN component escaping', () => {
    it('should escape special characters with a backslash', () => {
      expect(escapeDnComponent('Smith, John')).toBe('Smith\\,\\ John');
      expect(escapeDnComponent('a+b=c')).toBe('a\\+b\\=c');
    });

    it('should round-trip every special character', () => {
      for (const ch of DN_SPECIAL_CHARACTERS) {
        const value = `x${ch}y${ch}`;
        expect(unescapeDnComponent(escapeDnComponent(value))).toBe(value);
      }
    });

    it('should decode hex escaped UTF-8 bytes', () => {
      expect(unescapeDnComponent('Caf\\C3\\A9')).toBe('Café');
    });

    it('should leave a lone trailing backslash as is', () => {
      expect(unescapeDnComponent('abc\\')).toBe('abc\\');
    });
  });

  describe('parseDn', () => {
    it('should split on unescaped commas only', () => {
      expect(parseDn('CN=Smith\\, John,OU=Staff,DC=corp')).toEqual([
        ['CN', 'Smith\\, John'],
        ['OU', 'Staff'],
        ['DC', 'corp']
      ]);
    });

    it('should throw InvalidDnError for malformed input', () => {
      expect(() => parseDn('')).toThrow(InvalidDnError);
      expect(() => parseDn('no equals sign')).toThrow(InvalidDnError);
      expect(() => parseDn('CN=ok,broken')).toThrow(InvalidDnError);
    });
  });

  describe('cnFromDn', () => {
    it('should return the first RDN value unescaped', () => {
      expect(cnFromDn(`CN=Smith\\, John,OU=Staff,${DOMAIN_DN}`)).toBe('Smith, John');
    });

    it('should work for RDN types other than CN', () => {
      expect(cnFromDn(`OU=Staff,${DOMAIN_DN}`)).toBe('Staff');
    });

    it('should take the first attribute of a multi-valued RDN', () => {
      expect(cnFromDn('CN=Web+UID=42,DC=corp')).toBe('Web');
    });

    it('should tolerate spaces around the separator', () => {
      expect(cnFromDn('CN= Domain Users , DC=corp')).toBe('Domain Users');
    });
  });

  describe('displayNameFromDn', () => {
    it('should fall back to the DN when it cannot be parsed', () => {
      expect(displayNameFromDn('garbage')).toBe('garbage');
      expect(displayNameFromDn(`CN=Backup Operators,${DOMAIN_DN}`)).toBe('Backup Operators');
    });
  });

  describe('ridFromSid', () => {
    it('should return the last token as a number', () => {
      expect(ridFromSid(`${DOMAIN_SID}-512`)).toBe(512);
      expect(ridFromSid('S-1-5-32-544')).toBe(544);
    });

    it('should return undefined for malformed SIDs', () => {
      expect(ridFromSid('S-1-5-21-x')).toBeUndefined();
      expect(ridFromSid('')).toBeUndefined();
      expect(ridFromSid('S-1-5-21-')).toBeUndefined();
    });
  });

  describe('buildRidToNameMap', () => {
    it('should map RIDs to group names', () => {
      const { map, faults } = buildRidToNameMap([
        makeGroup('Domain Users', 513),
        makeGroup('Domain Admins', 512)
      ]);

      expect([...map.entries()]).toEqual([[513, 'Domain Users'], [512, 'Domain Admins']]);
      expect(faults).toEqual([]);
    });

    it('should name a group without cn after its DN', () => {
      const group = makeEntry(`CN=Helpdesk,OU=Groups,${DOMAIN_DN}`, { objectSid: `${DOMAIN_SID}-1105` });
      expect(buildRidToNameMap([group]).map.get(1105)).toBe('Helpdesk');
    });

    it('should report groups with missing or malformed SIDs as faults', () => {
      const noSid = makeEntry(`CN=Orphan,${DOMAIN_DN}`, { cn: 'Orphan' });
      const badSid = makeEntry(`CN=Broken,${DOMAIN_DN}`, { cn: 'Broken', objectSid: 'S-1-5-21-oops' });

      const { map, faults } = buildRidToNameMap([noSid, makeGroup('Guests', 514), badSid]);

      expect([...map.keys()]).toEqual([514]);
      expect(faults).toHaveLength(2);
      expect(faults[0]).toBeInstanceOf(MalformedSidError);
      expect(faults[0].dn).toBe(`CN=Orphan,${DOMAIN_DN}`);
      expect(faults[0].sid).toBeUndefined();
      expect(faults[1].sid).toBe('S-1-5-21-oops');
      expect(faults[1].code).toBe('MALFORMED_SID');
    });

    it('should report SID bytes that did not parse as malformed, not missing', () => {
      const group = makeEntry(`CN=Truncated,${DOMAIN_DN}`, { cn: 'Truncated', objectSid: Buffer.from([1, 5, 0]) });

      const { faults } = buildRidToNameMap([group]);

      expect(faults[0].sid).toBe('0x010500');
      expect(faults[0].message).toBe(`Malformed SID "0x010500" on CN=Truncated,${DOMAIN_DN}`);
    });
  });
});
