#!/usr/bin/env node
import 'dotenv/config';
import * as readline from 'readline';
import { parseArgs } from 'util';
import { logger, setLogLevel } from '@/utils/logger';
import { configService } from '@/config/config.service';
import { ApplicationConfiguration, ConfigOverrides } from '@/config/types';
import { LDAPClient } from '@/config/ldap';
import { isFatal } from '@/services/base/errors';
import { DirectoryService } from '@/services/directory.service';
import { DnsResolverService } from '@/services/dns-resolver.service';
import { ReportWriterService } from '@/services/report-writer.service';
import { SnapshotService } from '@/services/snapshot.service';

export const USAGE = `Usage: domain-snapshot [options] HOSTNAME

Dump users, computers, groups and domain policy over LDAP into HTML, JSON
and greppable reports.

Arguments:
  HOSTNAME                  host name, IP or ldap(s):// URL of a domain controller

Options:
  -u, --user USER           DOMAIN\\username or username@domain to bind as
  -p, --password PASSWORD   password; prompted for when a user is given without one
      --base-dn DN          search base, instead of the server's default naming context
      --ldaps               connect over LDAPS (port 636)
  -o, --outdir DIR          directory to write the reports to (default: .)
      --no-html             do not write HTML reports
      --no-json             do not write JSON reports
      --no-grep             do not write greppable reports
  -d, --delimiter CHAR      field delimiter of the greppable reports (default: tab)
  -r, --resolve             resolve computer hostnames to IPv4 addresses
  -n, --dns-server IP       DNS server to resolve hostnames with
      --dns-workers N       concurrent DNS lookups (default: 10)
  -v, --verbose             debug logging
  -h, --help                show this help and exit
`;

export interface CliArguments {
  help: boolean;
  overrides: ConfigOverrides;
}

/**
 * Turn argv into configuration overrides. Unknown options throw.
 */
export function parseCliArgs(argv: string[]): CliArguments {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    strict: true,
    options: {
      user: { type: 'string', short: 'u' },
      password: { type: 'string', short: 'p' },
      'base-dn': { type: 'string' },
      ldaps: { type: 'boolean' },
      outdir: { type: 'string', short: 'o' },
      'no-html': { type: 'boolean' },
      'no-json': { type: 'boolean' },
      'no-grep': { type: 'boolean' },
      delimiter: { type: 'string', short: 'd' },
      resolve: { type: 'boolean', short: 'r' },
      'dns-server': { type: 'string', short: 'n' },
      'dns-workers': { type: 'string' },
      verbose: { type: 'boolean', short: 'v' },
      help: { type: 'boolean', short: 'h' }
    }
  });

  if (positionals.length > 1) {
    throw new Error(`Expected one HOSTNAME, got ${positionals.length}: ${positionals.join(' ')}`);
  }

  const workers = values['dns-workers'];
  return {
    help: values.help ?? false,
    overrides: {
      host: positionals[0],
      user: values.user,
      password: values.password,
      baseDN: values['base-dn'],
      ldaps: values.ldaps,
      outdir: values.outdir,
      noHtml: values['no-html'],
      noJson: values['no-json'],
      noGrep: values['no-grep'],
      delimiter: values.delimiter,
      resolve: values.resolve,
      dnsServer: values['dns-server'],
      dnsWorkers: workers === undefined ? undefined : Number(workers),
      verbose: values.verbose
    }
  };
}

/**
 * Read a password from the terminal without echoing it
 */
function promptPassword(prompt: string): Promise<string> {
  const { stdin, stderr } = process;

  // Piped input: take the first line as is
  if (!stdin.isTTY) {
    const rl = readline.createInterface({ input: stdin });
    return new Promise(resolve => {
      let answer = '';
      rl.once('line', line => {
        answer = line;
        rl.close();
      });
      rl.once('close', () => resolve(answer));
    });
  }

  return new Promise((resolve, reject) => {
    let password = '';
    stderr.write(prompt);
    stdin.setRawMode(true);
    stdin.resume();
    stdin.setEncoding('utf8');

    const cleanup = (): void => {
      stdin.off('data', onData);
      stdin.setRawMode(false);
      stdin.pause();
      stderr.write('\n');
    };

    const onData = (chunk: string): void => {
      for (const key of chunk) {
        if (key === '\u0003') { // Ctrl+C
          cleanup();
          reject(new Error('Password prompt cancelled'));
          return;
        } else if (key === '\r' || key === '\n') { // Enter
          cleanup();
          resolve(password);
          return;
        } else if (key === '\u007f') { // Backspace
          password = password.slice(0, -1);
        } else {
          password += key;
        }
      }
    };

    stdin.on('data', onData);
  });
}

function reportFailure(error: unknown): void {
  if (isFatal(error)) {
    logger.error(`${error.name}: ${error.message}`);
  } else {
    logger.error('Domain dump failed:', error);
  }
}

export async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
  let args: CliArguments;
  try {
    args = parseCliArgs(argv);
  } catch (error) {
    logger.error(error instanceof Error ? error.message : String(error));
    process.stderr.write(USAGE);
    return 1;
  }

  if (args.help) {
    process.stdout.write(USAGE);
    return 0;
  }

  const { overrides } = args;
  const username = overrides.user ?? process.env.AD_USERNAME;
  if (username && overrides.password === undefined && !process.env.AD_PASSWORD) {
    overrides.password = await promptPassword('Password: ');
  }

  configService.initialize(overrides);
  let config: ApplicationConfiguration;
  try {
    config = configService.getConfig();
  } catch (error) {
    reportFailure(error);
    return 1;
  }

  const { directory: directoryConfig, output, dns, logging } = config;
  setLogLevel(logging.level);
  logger.debug(configService.getConfigSummary());

  const directory = new DirectoryService(
    new LDAPClient({
      url: directoryConfig.url,
      username: directoryConfig.username,
      password: directoryConfig.password,
      timeout: directoryConfig.timeout,
      connectTimeout: directoryConfig.connectTimeout,
      pageSize: directoryConfig.pageSize,
      rejectUnauthorized: directoryConfig.tlsRejectUnauthorized
    }),
    directoryConfig.baseDN
  );
  const writer = new ReportWriterService(output.basePath, output.stylesheetPath);
  const resolver = dns.resolveHostnames
    ? new DnsResolverService({ server: dns.server, timeout: dns.timeout, workers: dns.workers })
    : undefined;

  try {
    logger.info(`Connecting to ${directoryConfig.url}`);
    await directory.connect();
    logger.info('Bind OK');

    if (directoryConfig.username !== undefined) {
      const admin = await directory.isDomainAdmin(directoryConfig.username);
      logger.info(admin
        ? `${directoryConfig.username} is a member of Domain Admins or Administrators`
        : `${directoryConfig.username} is not a member of Domain Admins or Administrators`);
    }

    logger.info('Starting domain dump');
    const summary = await new SnapshotService(directory, writer, { output, dns }, resolver).run();
    logger.info('Domain dump finished', {
      ...summary.counts,
      files: summary.files.length,
      warnings: summary.warnings.length
    });
    return 0;
  } catch (error) {
    reportFailure(error);
    return 1;
  } finally {
    await directory.close().catch((error: unknown) => {
      logger.debug('Unbind failed', { error: error instanceof Error ? error.message : String(error) });
    });
  }
}

if (require.main === module) {
  main()
    .then(code => {
      process.exitCode = code;
    })
    .catch(error => {
      logger.error('Unhandled error:', error);
      process.exit(1);
    });
}
