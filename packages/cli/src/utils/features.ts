import type { MorphologicalSpec } from "@redup/shared-types";

/**
 * Parse `--features` values of the form `T=past` or `T=past.3sg`.
 * Repeating a label accumulates its features.
 */
export function parseFeatureOptions(values: readonly string[]): MorphologicalSpec {
  const spec: MorphologicalSpec = {};
  for (const raw of values) {
    const eq = raw.indexOf("=");
    const label = eq < 0 ? "" : raw.slice(0, eq).trim();
    if (!label) throw new Error(`Invalid feature "${raw}"; expected LABEL=feature[.feature]`);
    const features = raw.slice(eq + 1).split(".").map(f => f.trim()).filter(f => f !== "");
    spec[label] = [...new Set([...(spec[label] ?? []), ...features])];
  }
  return spec;
}

/** Accumulator for repeatable options */
export function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}
