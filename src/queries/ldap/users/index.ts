export { domainUsersReport } from './domain-users';
export { usersByGroupReport } from './users-by-group';
