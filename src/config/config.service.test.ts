jest.mock('@/utils/logger', () => ({
  logger: {
    info: jest.fn(),
    error: jest.fn(),
    warn: jest.fn(),
    debug: jest.fn()
  }
}));

import { ConfigurationService, DEFAULT_STYLESHEET } from './config.service';
import { logger } from '@/utils/logger';
import { ValidationError } from '@/services/base/errors';

describe('ConfigurationService', () => {
  let service: ConfigurationService;

  beforeEach(() => {
    jest.clearAllMocks();
    service = new ConfigurationService();
  });

  it('should throw when read before initialize', () => {
    expect(() => service.getConfig()).toThrow('Configuration not initialized. Call initialize() first.');
  });

  it('should apply defaults', () => {
    const result = service.initialize({ host: 'dc01.corp.example.com', user: 'CORP\\auditor', password: 'test-secret' }, {});

    expect(result).toEqual({ isValid: true, errors: [], warnings: [] });
    expect(service.getConfig()).toEqual({
      directory: {
        server: 'dc01.corp.example.com',
        url: 'ldap://dc01.corp.example.com:389',
        useLDAPS: false,
        username: 'CORP\\auditor',
        password: 'test-secret',
        baseDN: undefined,
        timeout: 30000,
        connectTimeout: 10000,
        pageSize: 500,
        tlsRejectUnauthorized: true
      },
      output: {
        basePath: '.',
        formats: { html: true, json: true, grep: true },
        delimiter: '\t',
        fileNames: {
          users: 'domain_users',
          groups: 'domain_groups',
          computers: 'domain_computers',
          policy: 'domain_policy',
          usersByGroup: 'domain_users_by_group',
          computersByOs: 'domain_computers_by_os'
        },
        stylesheetPath: DEFAULT_STYLESHEET
      },
      dns: { resolveHostnames: false, server: undefined, timeout: 2000, workers: 10 },
      logging: { level: 'info' }
    });
  });

  it('should read the environment', () => {
    service.initialize({}, {
      AD_SERVER: 'dc02',
      AD_USE_LDAPS: 'true',
      AD_USERNAME: 'auditor@corp.example.com',
      AD_PASSWORD: 'test-secret',
      AD_BASE_DN: 'OU=Branch,DC=corp,DC=example,DC=com',
      OUTPUT_DIR: '/tmp/dump',
      GREP_DELIMITER: ';',
      RESOLVE_HOSTNAMES: 'true',
      DNS_SERVER: '10.0.0.53',
      DNS_WORKERS: '4',
      LDAP_PAGE_SIZE: '1000',
      LOG_LEVEL: 'warn',
      AD_TLS_REJECT_UNAUTHORIZED: 'false'
    });

    const { directory, output, dns, logging } = service.getConfig();
    expect(directory.url).toBe('ldaps://dc02:636');
    expect(directory.username).toBe('auditor@corp.example.com');
    expect(directory.baseDN).toBe('OU=Branch,DC=corp,DC=example,DC=com');
    expect(directory.pageSize).toBe(1000);
    expect(directory.tlsRejectUnauthorized).toBe(false);
    expect(output.basePath).toBe('/tmp/dump');
    expect(output.delimiter).toBe(';');
    expect(dns).toEqual({ resolveHostnames: true, server: '10.0.0.53', timeout: 2000, workers: 4 });
    expect(logging.level).toBe('warn');
    expect(service.hasErrors()).toBe(false);
  });

  it('should let command-line overrides win over the environment', () => {
    service.initialize(
      { host: 'dc03', outdir: 'out', noGrep: true, delimiter: '|', dnsWorkers: 2, verbose: true },
      { AD_SERVER: 'dc02', OUTPUT_DIR: '/tmp/dump', GREP_DELIMITER: ';', DNS_WORKERS: '8', LOG_LEVEL: 'warn' }
    );

    const { directory, output, dns, logging } = service.getConfig();
    expect(directory.server).toBe('dc03');
    expect(output.basePath).toBe('out');
    expect(output.formats).toEqual({ html: true, json: true, grep: false });
    expect(output.delimiter).toBe('|');
    expect(dns.workers).toBe(2);
    expect(logging.level).toBe('debug');
  });

  it('should require a host', () => {
    const result = service.initialize({ user: 'CORP\\auditor' }, {});
    expect(result.isValid).toBe(false);
    expect(result.errors).toEqual(['Directory host is required (HOSTNAME argument or AD_SERVER)']);
  });

  it('should require a domain in the username', () => {
    const result = service.initialize({ host: 'dc01', user: 'auditor' }, {});
    expect(result.errors).toEqual(['Username must include a domain, use: DOMAIN\\username or username@domain']);
  });

  it('should warn about anonymous binds', () => {
    const result = service.initialize({ host: 'dc01' }, {});

    expect(result.isValid).toBe(true);
    expect(result.warnings).toEqual([
      'Connecting as anonymous user, dumping will probably fail. Consider specifying a username/password to login with'
    ]);
    expect(logger.warn).toHaveBeenCalledWith(result.warnings[0]);
  });

  it('should reject bad delimiters, worker counts and DNS servers', () => {
    const result = service.initialize(
      { host: 'dc01', user: 'CORP\\auditor', delimiter: '\n', dnsWorkers: 0, dnsServer: 'ns1.corp', resolve: true },
      {}
    );

    expect(result.errors).toEqual([
      'Field delimiter must be non-empty and must not contain a line break',
      'DNS worker count must be a positive integer',
      'DNS server must be an IP address, got "ns1.corp"'
    ]);
    expect(service.getErrors()).toBe(result.errors);
  });

  it('should reject a delimiter containing a space', () => {
    const result = service.initialize({ host: 'dc01', user: 'C\\u', password: 'test-secret', delimiter: ' ' }, {});

    expect(result.isValid).toBe(false);
    expect(result.errors).toEqual(['Field delimiter must not contain a space']);
  });

  it('should raise ValidationError when reading an invalid configuration', () => {
    service.initialize({ user: 'auditor', delimiter: ' ' }, {});

    expect(() => service.getConfig()).toThrow(ValidationError);
    expect(() => service.getConfig()).toThrow(
      'Invalid configuration: Directory host is required (HOSTNAME argument or AD_SERVER); ' +
      'Username must include a domain, use: DOMAIN\\username or username@domain; ' +
      'Field delimiter must not contain a space'
    );
  });

  it('should reject non-numeric timeouts', () => {
    const result = service.initialize({ host: 'dc01', user: 'CORP\\auditor' }, { LDAP_TIMEOUT: 'soon' });
    expect(result.errors).toEqual(['LDAP_TIMEOUT must be a positive integer']);
  });

  it('should warn when every format is disabled', () => {
    const result = service.initialize({ host: 'dc01', user: 'CORP\\auditor', noHtml: true, noJson: true, noGrep: true }, {});
    expect(result.warnings).toEqual(['All output formats are disabled, no report files will be written']);
  });

  it('should summarize the target', () => {
    service.initialize({ host: 'dc01', user: 'CORP\\auditor', noGrep: true, outdir: '/srv/reports', resolve: true }, {});
    expect(service.getConfigSummary()).toBe(
      'Target ldap://dc01:389 as CORP\\auditor, writing html, json to /srv/reports, resolving hostnames via system DNS'
    );
  });
});
