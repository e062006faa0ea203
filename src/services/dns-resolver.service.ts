import { Resolver } from 'dns/promises';
import { logger } from '@/utils/logger';
import { DirectoryEntry, stringValue } from '@/types/directory.types';

export type LookupResult =
  | { ok: true; address: string }
  | { ok: false; reason: 'NXDOMAIN' | 'TIMEOUT' };

/**
 * The A-record lookup the service needs; dns/promises Resolver satisfies it
 */
export interface HostResolver {
  resolve4(hostname: string): Promise<string[]>;
}

export interface DnsResolverOptions {
  server?: string;
  timeout: number;
  workers: number;
}

// Values of the synthetic IPv4 attribute when there is no address
export const DNS_SENTINELS = Object.freeze({
  NXDOMAIN: 'error.NXDOMAIN',
  TIMEOUT: 'error.TIMEOUT',
  NOHOSTNAME: 'error.NOHOSTNAME'
});

// Name does not exist, or exists without an A record
const NOT_FOUND_CODES = ['ENOTFOUND', 'ENODATA', 'NXDOMAIN'];

function isNotFound(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error &&
    typeof error.code === 'string' && NOT_FOUND_CODES.includes(error.code);
}

/**
 * Run `task` over `items` with at most `workers` in flight
 */
export async function runPool<T>(
  items: readonly T[],
  workers: number,
  task: (item: T) => Promise<void>
): Promise<void> {
  let next = 0;
  const worker = async (): Promise<void> => {
    while (next < items.length) {
      const item = items[next++];
      await task(item);
    }
  };
  await Promise.all(Array.from({ length: Math.min(workers, items.length) }, worker));
}

export class DnsResolverService {
  private logger = logger.child({ service: 'DnsResolverService' });
  private options: DnsResolverOptions;
  private resolver: HostResolver;

  constructor(options: Partial<DnsResolverOptions> = {}, resolver?: HostResolver) {
    this.options = {
      timeout: 2000,
      workers: 10,
      ...options
    };
    this.resolver = resolver ?? this.createResolver();
  }

  private createResolver(): Resolver {
    const resolver = new Resolver({ timeout: this.options.timeout, tries: 1 });
    if (this.options.server) {
      resolver.setServers([this.options.server]);
    }
    return resolver;
  }

  /**
   * First A record of a hostname
   */
  async resolveA(hostname: string): Promise<LookupResult> {
    try {
      const [address] = await this.resolver.resolve4(hostname);
      return address === undefined ? { ok: false, reason: 'NXDOMAIN' } : { ok: true, address };
    } catch (error) {
      if (isNotFound(error)) {
        return { ok: false, reason: 'NXDOMAIN' };
      }
      this.logger.debug(`Lookup of ${hostname} failed`, { error: String(error) });
      return { ok: false, reason: 'TIMEOUT' };
    }
  }

  /**
   * Give every computer an IPv4 attribute: its first A record or a sentinel.
   * Each lookup writes only to its own entry.
   */
  async attachAddresses(computers: readonly DirectoryEntry[]): Promise<void> {
    this.logger.info(`Resolving ${computers.length} computer hostnames with ${this.options.workers} workers`);

    await runPool(computers, this.options.workers, async computer => {
      const hostname = computer.getString('dNSHostName');
      let ip: string;
      if (hostname === undefined) {
        ip = DNS_SENTINELS.NOHOSTNAME;
      } else {
        const result = await this.resolveA(hostname);
        ip = result.ok ? result.address : DNS_SENTINELS[result.reason];
      }
      computer.set({ name: 'IPv4', values: [stringValue(ip)], multiValued: false });
    });
  }
}
