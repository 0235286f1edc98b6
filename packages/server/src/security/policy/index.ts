/**
 * Access Control Pipeline - Policy Module
 *
 * Public API for policy loading, matching and the policy store.
 */

// Matching
export { actionMatches, anyActionMatches } from './match.js';

// Loader
export {
  computePolicyHash,
  buildPolicySnapshot,
  parsePolicyDocument,
  loadPolicyFromFile,
} from './loader.js';

// Store
export { PolicyStore, type PolicyReloadResult } from './store.js';
