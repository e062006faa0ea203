import { ReportDefinition } from '../types';
import { USER_COLUMNS } from './columns';

// Users under each group they belong to, primary group included
export const usersByGroupReport: ReportDefinition = {
  id: 'users_by_group',
  title: 'Domain users by group',
  source: 'users',
  fileKey: 'usersByGroup',
  columns: USER_COLUMNS,
  grouping: 'membership',
  formats: ['html', 'json']
};
