export { domainComputersReport } from './domain-computers';
export { computersByOsReport } from './computers-by-os';
