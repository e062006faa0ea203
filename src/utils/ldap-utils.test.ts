import {
  PWD_FLAGS,
  UAC_FLAGS,
  escapeFilterValue,
  formatLdapUrl,
  guidBufferToString,
  ldapTimestampToDate,
  lowerCaseSet,
  parseFlags,
  sidBufferToString,
  windowsFileTimeToDate
} from './ldap-utils';

describe('LDAP Utilities', () => {
  describe('parseFlags', () => {
    it('should decode a workstation account', () => {
      expect(parseFlags(0x1200, UAC_FLAGS)).toEqual(['NORMAL_ACCOUNT', 'WORKSTATION_ACCOUNT']);
    });

    it('should decode every bit of 0x210 in table order', () => {
      expect(parseFlags(0x210, UAC_FLAGS)).toEqual(['ACCOUNT_LOCKED', 'NORMAL_ACCOUNT']);
    });

    it('should decode password properties', () => {
      expect(parseFlags(0x9, PWD_FLAGS)).toEqual(['PASSWORD_COMPLEX', 'LOCKOUT_ADMINS']);
    });

    it('should return nothing for zero', () => {
      expect(parseFlags(0, UAC_FLAGS)).toEqual([]);
    });

    it('should return exactly the flags whose mask is contained in the value', () => {
      const masks = Object.values(UAC_FLAGS);
      for (let i = 0; i < 64; i++) {
        // Random subset of the known flags plus an unknown high bit
        const chosen = masks.filter((_, bit) => (i * 7 + bit) % 3 === 0);
        const value = chosen.reduce((acc, mask) => acc | mask, 0x4000000);
        const expected = Object.entries(UAC_FLAGS)
          .filter(([, mask]) => chosen.includes(mask))
          .map(([name]) => name);
        expect(parseFlags(value, UAC_FLAGS)).toEqual(expected);
      }
    });
  });

  describe('escapeFilterValue', () => {
    it('should escape filter metacharacters', () => {
      expect(escapeFilterValue('a*(b)\\')).toBe('a\\2a\\28b\\29\\5c');
    });

    it('should leave plain names alone', () => {
      expect(escapeFilterValue('jdoe')).toBe('jdoe');
    });
  });

  describe('Windows FileTime Conversions', () => {
    it('should convert Windows FileTime to Date', () => {
      expect(windowsFileTimeToDate('133485408000000000')?.toISOString()).toBe('2024-01-01T00:00:00.000Z');
    });

    it('should return null for zero and never', () => {
      expect(windowsFileTimeToDate('0')).toBeNull();
      expect(windowsFileTimeToDate(0)).toBeNull();
      expect(windowsFileTimeToDate('9223372036854775807')).toBeNull();
    });

    it('should return null for non-numeric input', () => {
      expect(windowsFileTimeToDate('soon')).toBeNull();
    });
  });

  describe('ldapTimestampToDate', () => {
    it('should parse generalized time as UTC', () => {
      expect(ldapTimestampToDate('20240115134500.0Z')?.toISOString()).toBe('2024-01-15T13:45:00.000Z');
    });

    it('should return null for malformed input', () => {
      expect(ldapTimestampToDate('yesterday')).toBeNull();
    });
  });

  describe('sidBufferToString', () => {
    it('should convert a binary SID', () => {
      const buffer = Buffer.from('010200000000000520000000' + '20020000', 'hex');
      expect(sidBufferToString(buffer)).toBe('S-1-5-32-544');
    });

    it('should reject truncated buffers', () => {
      expect(sidBufferToString(Buffer.from('0102000000', 'hex'))).toBeNull();
      expect(sidBufferToString(Buffer.from('010200000000000520000000', 'hex'))).toBeNull();
    });
  });

  describe('guidBufferToString', () => {
    it('should convert a mixed-endian GUID', () => {
      const buffer = Buffer.from('000102030405060708090a0b0c0d0e0f', 'hex');
      expect(guidBufferToString(buffer)).toBe('03020100-0504-0706-0809-0a0b0c0d0e0f');
    });

    it('should reject buffers of the wrong length', () => {
      expect(guidBufferToString(Buffer.alloc(15))).toBeNull();
    });
  });

  describe('formatLdapUrl', () => {
    it('should build URLs from host names', () => {
      expect(formatLdapUrl('dc01.corp.example.com', false)).toBe('ldap://dc01.corp.example.com:389');
      expect(formatLdapUrl('10.0.0.5', true)).toBe('ldaps://10.0.0.5:636');
    });

    it('should keep URLs as given', () => {
      expect(formatLdapUrl('ldaps://dc01:3269', false)).toBe('ldaps://dc01:3269');
    });
  });

  describe('lowerCaseSet', () => {
    it('should match names regardless of case', () => {
      const set = lowerCaseSet(['objectSid', 'memberOf']);
      expect(set.has('objectsid')).toBe(true);
      expect(set.has('MEMBEROF'.toLowerCase())).toBe(true);
      expect(set.has('cn')).toBe(false);
    });
  });
});
