/**
 * Hash utilities module
 *
 * FNV-64 hashing and level checksums.
 */

export * from "./checksum";
export * from "./fnv64";
