/**
 * Repository Exports
 */

export { cacheRepo } from "./cache.repository.js";
export { sessionRepo } from "./session.repository.js";
