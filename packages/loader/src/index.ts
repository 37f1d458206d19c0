/**
 * @redup/loader
 * Reads a language description from a folder of rule files or a
 * description.json, and validates JSON descriptions with zod.
 */
export * from "./parsers.js";
export * from "./schema.js";
export * from "./load.js";
