/**
 * Command failures: a one-line `✗` title, then `→` next steps.
 */

export function formatError(title: string, nextSteps: readonly string[] = []): string {
  const lines = [`✗ ${title}`];
  if (nextSteps.length > 0) lines.push("", ...nextSteps.map(step => `→ ${step}`));
  return lines.join("\n");
}

/** Print {@link formatError} on stderr and exit 1 */
export function exitWithError(title: string, nextSteps?: string[]): never {
  console.error(formatError(title, nextSteps));
  process.exit(1);
}
