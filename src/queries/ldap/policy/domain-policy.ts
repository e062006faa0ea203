import { ReportDefinition } from '../types';

export const domainPolicyReport: ReportDefinition = {
  id: 'policy',
  title: 'Domain policy',
  source: 'policy',
  fileKey: 'policy',
  columns: [
    'cn',
    'lockOutObservationWindow',
    'lockoutDuration',
    'lockoutThreshold',
    'maxPwdAge',
    'minPwdAge',
    'minPwdLength',
    'pwdHistoryLength',
    'pwdProperties'
  ],
  formats: ['html', 'json', 'grep']
};
