export { ThingSchema } from './thing.js';
export type { Thing } from './thing.js';
export { EMPTY_LISTING, extractListing } from './listing.js';
export type { ListingResponse } from './listing.js';
export { extractMe, extractUser, extractSubreddit } from './accounts.js';
export type { MeResponse, UserResponse, SubredditResponse } from './accounts.js';
export { extractRefreshToken } from './refresh-token.js';
export type { RefreshTokenResponse } from './refresh-token.js';
export { splitId, postIdFromContext } from './ids.js';
