import path from 'path';
import { isIP } from 'net';
import {
  ApplicationConfiguration,
  ConfigOverrides,
  ConfigValidationResult,
  DirectoryConfig,
  DnsConfig,
  OutputConfig
} from './types';
import { ValidationError } from '@/services/base/errors';
import { formatLdapUrl } from '@/utils/ldap-utils';
import { logger } from '@/utils/logger';

type Environment = Record<string, string | undefined>;

export const DEFAULT_FILE_NAMES = Object.freeze({
  users: 'domain_users',
  groups: 'domain_groups',
  computers: 'domain_computers',
  policy: 'domain_policy',
  usersByGroup: 'domain_users_by_group',
  computersByOs: 'domain_computers_by_os'
});

// Shipped beside the sources and beside the build output alike
export const DEFAULT_STYLESHEET = path.resolve(__dirname, '../../assets/style.css');

const LOG_LEVELS = ['error', 'warn', 'info', 'debug'] as const;

function parseNumber(value: string | undefined, fallback: number): number {
  return value === undefined || value === '' ? fallback : parseInt(value, 10);
}

function isLogLevel(value: string): value is ApplicationConfiguration['logging']['level'] {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

/**
 * Centralized Configuration Management Service
 * Merges environment variables and command-line overrides, then validates the result
 */
export class ConfigurationService {
  private config: ApplicationConfiguration | null = null;
  private validationResult: ConfigValidationResult | null = null;

  /**
   * Load and validate configuration
   */
  initialize(overrides: ConfigOverrides = {}, env: Environment = process.env): ConfigValidationResult {
    this.config = this.loadConfiguration(overrides, env);
    this.validationResult = this.validateConfiguration(this.config);

    if (this.validationResult.errors.length > 0) {
      logger.debug('Configuration validation errors:', { errors: this.validationResult.errors });
    }

    for (const warning of this.validationResult.warnings) {
      logger.warn(warning);
    }

    return this.validationResult;
  }

  /**
   * Get full application configuration. Throws ValidationError while the
   * loaded configuration has errors.
   */
  getConfig(): ApplicationConfiguration {
    if (!this.config) {
      throw new Error('Configuration not initialized. Call initialize() first.');
    }
    if (this.hasErrors()) {
      throw new ValidationError(`Invalid configuration: ${this.getErrors().join('; ')}`);
    }
    return this.config;
  }

  hasErrors(): boolean {
    return (this.validationResult?.errors?.length ?? 0) > 0;
  }

  getErrors(): string[] {
    return this.validationResult?.errors || [];
  }

  private loadConfiguration(overrides: ConfigOverrides, env: Environment): ApplicationConfiguration {
    const envLevel = env.LOG_LEVEL ?? 'info';
    return {
      directory: this.loadDirectoryConfig(overrides, env),
      output: this.loadOutputConfig(overrides, env),
      dns: this.loadDnsConfig(overrides, env),
      logging: {
        level: overrides.verbose ? 'debug' : (isLogLevel(envLevel) ? envLevel : 'info')
      }
    };
  }

  private loadDirectoryConfig(overrides: ConfigOverrides, env: Environment): DirectoryConfig {
    const server = overrides.host ?? env.AD_SERVER ?? '';
    const useLDAPS = overrides.ldaps ?? env.AD_USE_LDAPS === 'true';
    const username = overrides.user ?? (env.AD_USERNAME || undefined);

    return {
      server,
      url: server ? formatLdapUrl(server, useLDAPS) : '',
      useLDAPS,
      username,
      password: overrides.password ?? (env.AD_PASSWORD || undefined),
      baseDN: overrides.baseDN ?? (env.AD_BASE_DN || undefined),
      timeout: parseNumber(env.LDAP_TIMEOUT, 30000),
      connectTimeout: parseNumber(env.LDAP_CONNECT_TIMEOUT, 10000),
      pageSize: parseNumber(env.LDAP_PAGE_SIZE, 500),
      tlsRejectUnauthorized: env.AD_TLS_REJECT_UNAUTHORIZED !== 'false'
    };
  }

  private loadOutputConfig(overrides: ConfigOverrides, env: Environment): OutputConfig {
    return {
      basePath: overrides.outdir ?? (env.OUTPUT_DIR || '.'),
      formats: {
        html: !overrides.noHtml,
        json: !overrides.noJson,
        grep: !overrides.noGrep
      },
      // Default field delimiter for greppable format is a tab
      delimiter: overrides.delimiter ?? (env.GREP_DELIMITER || '\t'),
      fileNames: { ...DEFAULT_FILE_NAMES },
      stylesheetPath: env.STYLESHEET_PATH || DEFAULT_STYLESHEET
    };
  }

  private loadDnsConfig(overrides: ConfigOverrides, env: Environment): DnsConfig {
    return {
      resolveHostnames: overrides.resolve ?? env.RESOLVE_HOSTNAMES === 'true',
      server: overrides.dnsServer ?? (env.DNS_SERVER || undefined),
      timeout: parseNumber(env.DNS_TIMEOUT, 2000),
      workers: overrides.dnsWorkers ?? parseNumber(env.DNS_WORKERS, 10)
    };
  }

  /**
   * Validate the loaded configuration
   */
  private validateConfiguration(config: ApplicationConfiguration): ConfigValidationResult {
    const errors: string[] = [];
    const warnings: string[] = [];
    const { directory, output, dns } = config;

    if (!directory.server) {
      errors.push('Directory host is required (HOSTNAME argument or AD_SERVER)');
    }

    if (directory.username === undefined) {
      warnings.push('Connecting as anonymous user, dumping will probably fail. Consider specifying a username/password to login with');
    } else if (!directory.username.includes('\\') && !directory.username.includes('@')) {
      errors.push('Username must include a domain, use: DOMAIN\\username or username@domain');
    }

    for (const [name, value] of [
      ['LDAP_TIMEOUT', directory.timeout],
      ['LDAP_CONNECT_TIMEOUT', directory.connectTimeout],
      ['LDAP_PAGE_SIZE', directory.pageSize],
      ['DNS_TIMEOUT', dns.timeout]
    ] as const) {
      if (!Number.isInteger(value) || value < 1) {
        errors.push(`${name} must be a positive integer`);
      }
    }

    if (output.delimiter === '' || /[\r\n]/.test(output.delimiter)) {
      errors.push('Field delimiter must be non-empty and must not contain a line break');
    } else if (output.delimiter.includes(' ')) {
      errors.push('Field delimiter must not contain a space');
    }

    if (!Object.values(output.formats).some(Boolean)) {
      warnings.push('All output formats are disabled, no report files will be written');
    }

    if (!Number.isInteger(dns.workers) || dns.workers < 1) {
      errors.push('DNS worker count must be a positive integer');
    }

    if (dns.server !== undefined && isIP(dns.server) === 0) {
      errors.push(`DNS server must be an IP address, got "${dns.server}"`);
    }

    if (dns.server !== undefined && !dns.resolveHostnames) {
      warnings.push('A DNS server was given but hostname resolution is off');
    }

    return {
      isValid: errors.length === 0,
      errors,
      warnings
    };
  }

  /**
   * Get a human-readable configuration summary
   */
  getConfigSummary(): string {
    if (!this.config) {
      return 'Configuration not initialized';
    }

    const { directory, output, dns } = this.config;
    const formats = Object.entries(output.formats)
      .filter(([, enabled]) => enabled)
      .map(([format]) => format)
      .join(', ');

    return `Target ${directory.url} as ${directory.username ?? 'anonymous'}, ` +
      `writing ${formats || 'nothing'} to ${path.resolve(output.basePath)}` +
      (dns.resolveHostnames ? `, resolving hostnames via ${dns.server ?? 'system DNS'}` : '');
  }
}

// Export singleton instance
export const configService = new ConfigurationService();
