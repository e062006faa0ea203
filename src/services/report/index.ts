/**
 * Report Pipeline Module Exports
 *
 * Central export point for the decoding, indexing and rendering components
 */

export { AttributeDecoder } from './AttributeDecoder';
export { ReportRenderer } from './ReportRenderer';
export { groupByOS, groupByMembership, UNKNOWN_KEY } from './RelationalIndexer';
export {
  sanitizeId,
  cnFromDn,
  displayNameFromDn,
  unescapeDnComponent,
  escapeDnComponent,
  ridFromSid,
  buildRidToNameMap
} from './IdentityResolver';

// Types
export * from './types';
