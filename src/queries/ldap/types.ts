/**
 * Report Definition Types
 */

import { OutputFormat } from '@/services/report/types';
import { ReportFileNames } from '@/config/types';

export type EntrySource = 'users' | 'computers' | 'groups' | 'policy';

export interface ReportDefinition {
  id: string;
  // Section header of the flat tables; grouped reports carry one per key
  title: string;

  // Fetched entry list the report is rendered from
  source: EntrySource;
  // Key of the configurable output base name
  fileKey: keyof ReportFileNames;

  columns: readonly string[];
  // Columns that only exist once computer hostnames were resolved
  resolvedColumns?: readonly string[];

  grouping?: 'membership' | 'operatingSystem';
  formats: readonly OutputFormat[];
}

/**
 * Column list of a report for one run
 */
export function reportColumns(definition: ReportDefinition, resolveHostnames: boolean): string[] {
  const optional = definition.resolvedColumns ?? [];
  return definition.columns.filter(column => resolveHostnames || !optional.includes(column));
}
