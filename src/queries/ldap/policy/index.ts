export { domainPolicyReport } from './domain-policy';
