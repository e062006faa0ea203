import { ReportDefinition } from '../types';
import { COMPUTER_COLUMNS } from './columns';

export const domainComputersReport: ReportDefinition = {
  id: 'computers',
  title: 'Domain computer accounts',
  source: 'computers',
  fileKey: 'computers',
  columns: COMPUTER_COLUMNS,
  resolvedColumns: ['IPv4'],
  formats: ['html', 'json', 'grep']
};
