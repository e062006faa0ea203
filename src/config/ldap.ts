import { Client } from 'ldapts';
import { logger } from '@/utils/logger';
import { BINARY_ATTRIBUTES } from '@/utils/ldap-utils';
import {
  AuthenticationError,
  ConnectionError,
  DataSourceError,
  QueryError,
  TimeoutError
} from '@/services/base/errors';

export interface LDAPConfig {
  url: string;
  // Anonymous when absent
  username?: string;
  password?: string;
  timeout?: number;
  connectTimeout?: number;
  pageSize?: number;
  // Verify the server certificate on ldaps:// (default true)
  rejectUnauthorized?: boolean;
}

export interface LDAPSearchOptions {
  filter: string;
  scope?: 'base' | 'one' | 'sub';
  attributes?: string[];
  sizeLimit?: number;
}

export type RawAttributeValue = string | string[] | Buffer | Buffer[];

export interface LDAPSearchResult {
  dn: string;
  attributes: Record<string, RawAttributeValue>;
}

/**
 * The part of an LDAP session the directory service needs
 */
export interface DirectoryConnection {
  bind(): Promise<void>;
  getNamingContext(): Promise<string>;
  search(baseDN: string, options: LDAPSearchOptions): Promise<LDAPSearchResult[]>;
  close(): Promise<void>;
}

const NETWORK_ERRORS = ['ECONNRESET', 'ECONNREFUSED', 'ETIMEDOUT', 'ENOTFOUND', 'EHOSTUNREACH'];

// 49 = InvalidCredentialsError
const INVALID_CREDENTIALS = 49;

function errorCode(error: unknown): number | string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const { code } = error;
    if (typeof code === 'number' || typeof code === 'string') return code;
  }
  return undefined;
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * One LDAP session for the whole run. The dump is a handful of large paged
 * searches, so there is no pool.
 */
export class LDAPClient implements DirectoryConnection {
  private config: Required<Omit<LDAPConfig, 'username' | 'password'>> & LDAPConfig;
  private client: Client | null = null;

  constructor(config: LDAPConfig) {
    this.config = {
      timeout: 30000,
      connectTimeout: 10000,
      pageSize: 500,
      rejectUnauthorized: true,
      ...config
    };
  }

  private getClient(): Client {
    if (!this.client) {
      this.client = new Client({
        url: this.config.url,
        tlsOptions: {
          rejectUnauthorized: this.config.rejectUnauthorized,
          minVersion: 'TLSv1.2',
        },
        timeout: this.config.timeout,
        connectTimeout: this.config.connectTimeout,
      });
    }
    return this.client;
  }

  /**
   * Bind with the configured account. Without a username the session stays
   * anonymous and the RootDSE is read instead, so an unreachable server still
   * fails here rather than at the first search.
   */
  async bind(): Promise<void> {
    const { username, password } = this.config;

    if (username === undefined) {
      await this.getNamingContext();
      return;
    }

    try {
      await this.getClient().bind(username, password ?? '');
      logger.debug('LDAP client connected and bound successfully');
    } catch (error) {
      throw this.classify(error, `Bind to ${this.config.url} failed`);
    }
  }

  /**
   * Default naming context advertised by the RootDSE
   */
  async getNamingContext(): Promise<string> {
    const [rootDSE] = await this.search('', {
      filter: '(objectClass=*)',
      scope: 'base',
      attributes: ['defaultNamingContext']
    });

    const context = rootDSE?.attributes.defaultNamingContext;
    if (typeof context !== 'string' || context === '') {
      throw new QueryError('RootDSE does not advertise a defaultNamingContext');
    }
    return context;
  }

  async search(baseDN: string, options: LDAPSearchOptions): Promise<LDAPSearchResult[]> {
    try {
      const { searchEntries } = await this.getClient().search(baseDN, {
        scope: options.scope || 'sub',
        filter: options.filter,
        attributes: options.attributes || [],
        sizeLimit: options.sizeLimit || 0,
        // The RootDSE cannot be paged
        paged: baseDN === '' ? false : { pageSize: this.config.pageSize },
        explicitBufferAttributes: [...BINARY_ATTRIBUTES]
      });

      const results: LDAPSearchResult[] = searchEntries.map(({ dn, ...attributes }) => ({
        dn,
        attributes
      }));

      logger.debug(`LDAP search completed successfully, ${results.length} results`, {
        baseDN,
        filter: options.filter
      });
      return results;
    } catch (error) {
      throw this.classify(error, `Search ${options.filter} under "${baseDN}" failed`);
    }
  }

  async close(): Promise<void> {
    const client = this.client;
    this.client = null;
    if (client?.isConnected) {
      await client.unbind();
      logger.debug('LDAP connection closed');
    }
  }

  private classify(error: unknown, context: string): DataSourceError {
    if (error instanceof DataSourceError) return error;

    const cause = toError(error);
    const code = errorCode(error);
    const message = `${context}: ${cause.message}`;

    if (code === INVALID_CREDENTIALS) {
      return new AuthenticationError(message, cause);
    }
    if (cause.name === 'TimeoutError') {
      return new TimeoutError(message, cause);
    }
    if (typeof code === 'string' && NETWORK_ERRORS.includes(code)) {
      return new ConnectionError(message, cause);
    }
    // Any other failure before the session is usable is a connection problem
    if (!this.client?.isConnected) {
      return new ConnectionError(message, cause);
    }
    return new QueryError(message, cause);
  }
}
