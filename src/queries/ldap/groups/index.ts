export { domainGroupsReport } from './domain-groups';
