export { getPool, closePool, isDatabaseEnabled } from "./pool.js";

export * as usersRepo from "./repos/usersRepo.js";
export * as scanReportsRepo from "./repos/scanReportsRepo.js";
export * as tokenMetadataRepo from "./repos/tokenMetadataRepo.js";

export * from "./types.js";
