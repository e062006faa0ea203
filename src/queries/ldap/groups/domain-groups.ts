import { ReportDefinition } from '../types';

export const domainGroupsReport: ReportDefinition = {
  id: 'groups',
  title: 'Domain groups',
  source: 'groups',
  fileKey: 'groups',
  columns: ['cn', 'sAMAccountName', 'whenCreated', 'whenChanged', 'description', 'objectSid'],
  formats: ['html', 'json', 'grep']
};
