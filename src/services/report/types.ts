/**
 * Report Pipeline Types
 */

import { GroupedEntries } from '@/types/directory.types';
import { DataConsistencyFault } from '@/services/base/errors';

export type RenderMode = 'html' | 'flat';

export type OutputFormat = 'html' | 'json' | 'grep';

export interface DecoderOptions {
  /** Base name of the users-by-group report, target of group links */
  usersByGroupFile: string;
}

export interface RendererOptions {
  /** Field delimiter of the flat-text format */
  delimiter: string;
}

/** One entry as written to the structured-data report */
export interface StructuredEntry {
  dn: string;
  attributes: Record<string, string>;
}

/** One classification key with its members, as written to a grouped structured-data report */
export type StructuredGroup = Record<string, StructuredEntry[]>;

export interface IndexResult {
  groups: GroupedEntries;
  faults: DataConsistencyFault[];
}
