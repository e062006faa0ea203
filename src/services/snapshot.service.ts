import { logger } from '@/utils/logger';
import { DirectoryEntry, GroupedEntries } from '@/types/directory.types';
import { DnsConfig, OutputConfig } from '@/config/types';
import { DataConsistencyFault } from '@/services/base/errors';
import { DirectoryService } from '@/services/directory.service';
import { DnsResolverService } from '@/services/dns-resolver.service';
import { ReportWriterService } from '@/services/report-writer.service';
import {
  AttributeDecoder,
  OutputFormat,
  ReportRenderer,
  buildRidToNameMap,
  groupByMembership,
  groupByOS
} from '@/services/report';
import { EntrySource, ReportDefinition, reportColumns, reportRegistry } from '@/queries/ldap';

export type SnapshotData = Record<EntrySource, DirectoryEntry[]>;

export interface SnapshotSummary {
  counts: Record<EntrySource, number>;
  files: string[];
  warnings: string[];
}

export interface SnapshotOptions {
  output: OutputConfig;
  dns: DnsConfig;
}

/**
 * Snapshot Service
 *
 * Fetches everything first, then renders and writes the reports in registry
 * order. A failed fetch leaves the output directory untouched.
 */
export class SnapshotService {
  private logger = logger.child({ service: 'SnapshotService' });
  private renderer: ReportRenderer;

  constructor(
    private directory: DirectoryService,
    private writer: ReportWriterService,
    private options: SnapshotOptions,
    private resolver?: DnsResolverService
  ) {
    const decoder = new AttributeDecoder({ usersByGroupFile: options.output.fileNames.usersByGroup });
    this.renderer = new ReportRenderer(decoder, { delimiter: options.output.delimiter });
  }

  async run(): Promise<SnapshotSummary> {
    const data = await this.fetch();
    const warnings: string[] = [];

    const ridMap = buildRidToNameMap(data.groups);
    const membership = groupByMembership(data.users, ridMap.map);
    this.reportFaults([...ridMap.faults, ...membership.faults], warnings);

    const grouped: Record<NonNullable<ReportDefinition['grouping']>, GroupedEntries> = {
      membership: membership.groups,
      operatingSystem: groupByOS(data.computers)
    };

    const files: string[] = [];
    for (const definition of reportRegistry) {
      files.push(...await this.writeReport(definition, data, grouped));
    }

    return {
      counts: {
        users: data.users.length,
        computers: data.computers.length,
        groups: data.groups.length,
        policy: data.policy.length
      },
      files,
      warnings
    };
  }

  private async fetch(): Promise<SnapshotData> {
    await this.directory.connect();

    const users = await this.directory.getAllUsers();
    this.logger.info(`Found ${users.length} users`);
    const computers = await this.directory.getAllComputers();
    this.logger.info(`Found ${computers.length} computers`);
    const groups = await this.directory.getAllGroups();
    this.logger.info(`Found ${groups.length} groups`);

    if (this.options.dns.resolveHostnames) {
      if (!this.resolver) {
        throw new Error('Hostname resolution is enabled but no DNS resolver was given');
      }
      await this.resolver.attachAddresses(computers);
    }

    const policy = await this.directory.getDomainPolicy();
    return { users, computers, groups, policy };
  }

  private reportFaults(faults: readonly DataConsistencyFault[], warnings: string[]): void {
    for (const fault of faults) {
      this.logger.warn(fault.message, { code: fault.code });
      warnings.push(fault.message);
    }
  }

  private async writeReport(
    definition: ReportDefinition,
    data: SnapshotData,
    grouped: Record<NonNullable<ReportDefinition['grouping']>, GroupedEntries>
  ): Promise<string[]> {
    const { formats, fileNames } = this.options.output;
    const enabled = definition.formats.filter(format => formats[format]);
    if (enabled.length === 0) {
      return [];
    }

    const columns = reportColumns(definition, this.options.dns.resolveHostnames);
    const entries = data[definition.source];
    const groups = definition.grouping ? grouped[definition.grouping] : undefined;
    const stylesheet = enabled.includes('html') ? await this.writer.loadStylesheet() : undefined;
    const baseName = fileNames[definition.fileKey];
    this.logger.debug(`Writing report ${definition.id}`, { formats: enabled, entries: entries.length });

    // Files of one report are independent of each other
    return Promise.all(enabled.map(format => {
      const content = this.render(format, definition, entries, columns, groups, stylesheet);
      return this.writer.write(baseName, format, content);
    }));
  }

  private render(
    format: OutputFormat,
    definition: ReportDefinition,
    entries: readonly DirectoryEntry[],
    columns: readonly string[],
    groups: GroupedEntries | undefined,
    stylesheet: string | undefined
  ): string {
    switch (format) {
      case 'html': {
        const body = groups
          ? this.renderer.renderGroupedHtmlTables(groups, columns)
          : this.renderer.renderHtmlTable([this.renderer.renderHtmlSection(entries, columns, definition.title)]);
        return this.renderer.renderHtmlDocument(body, stylesheet);
      }
      case 'json':
        return groups ? this.renderer.renderJsonGrouped(groups) : this.renderer.renderJsonList(entries);
      case 'grep':
        return this.renderer.renderGrepList(entries, columns);
    }
  }
}
