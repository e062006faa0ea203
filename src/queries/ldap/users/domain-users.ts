import { ReportDefinition } from '../types';
import { USER_COLUMNS } from './columns';

export const domainUsersReport: ReportDefinition = {
  id: 'users',
  title: 'Domain users',
  source: 'users',
  fileKey: 'users',
  columns: USER_COLUMNS,
  formats: ['html', 'json', 'grep']
};
