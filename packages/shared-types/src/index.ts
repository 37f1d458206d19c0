/**
 * @redup/shared-types — rule tables, tree values, derivation records
 * and the error taxonomy shared by every package.
 */
export * from "./schema.js";
export * from "./errors.js";
export { FIXTURE_BABA, FIXTURE_TOBAK, FIXTURE_ILO } from "./fixtures.js";
