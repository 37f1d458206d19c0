/**
 * @redup/render
 * Derivation snapshots as labelled bracketing, ASCII outlines and SVG
 * tree diagrams.
 */
export * from "./text.js";
export * from "./svg.js";
export * from "./files.js";
