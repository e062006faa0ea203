/**
 * Report Registry
 * Reports in the order they are rendered and written
 */

import { ReportDefinition } from './types';
import { domainUsersReport, usersByGroupReport } from './users';
import { domainComputersReport, computersByOsReport } from './computers';
import { domainGroupsReport } from './groups';
import { domainPolicyReport } from './policy';

export const reportRegistry: readonly ReportDefinition[] = [
  domainUsersReport,
  domainGroupsReport,
  domainComputersReport,
  usersByGroupReport,
  computersByOsReport,
  domainPolicyReport
];

// Re-export types
export * from './types';
