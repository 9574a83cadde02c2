/**
 * Primitive Types
 *
 * Hex-encoded values as they travel between the factory, the execution
 * environment and the collaborators.
 *
 * Rules:
 * - Addresses are 20 bytes, `0x`-prefixed
 * - Hex strings are `0x`-prefixed; byte length is checked by consumers
 * - Amounts are bigint (uint256 range), never number
 */

/**
 * A 20-byte account address (e.g., "0x5FbDB2315678afecb367f032d93F642f64180aa3").
 */
export type Address = `0x${string}`;

/**
 * Arbitrary `0x`-prefixed hex data (salts, creation code, hashes).
 */
export type Hex = `0x${string}`;
