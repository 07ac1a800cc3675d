/**
 * Response verification
 * @module verify
 */

export { verifyStatus } from './status.js';
export { verifyStandardHeaders } from './headers.js';
export { countMatches, matchObject, matchUpload, verifyListing } from './matching.js';
export type { ListingExpectation, ReceivedListing, EntryMatcher } from './matching.js';
export { verifyResponse } from './response.js';
export type { BodyCheck } from './response.js';
