import { ReportDefinition } from '../types';
import { COMPUTER_COLUMNS } from './columns';

export const computersByOsReport: ReportDefinition = {
  id: 'computers_by_os',
  title: 'Domain computers by operating system',
  source: 'computers',
  fileKey: 'computersByOs',
  columns: COMPUTER_COLUMNS,
  resolvedColumns: ['IPv4'],
  grouping: 'operatingSystem',
  formats: ['html', 'json']
};
