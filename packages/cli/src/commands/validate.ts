/**
 * Validate command - run every validation pass over a description folder
 */

import { Command } from "commander";
import { DescriptionLoadError } from "@redup/shared-types";
import { loadDescription } from "@redup/loader";
import { validate, formatIssues } from "@redup/validation";
import { exitWithError } from "../utils/errorFormatter.js";

export const validateCommand = new Command("validate")
  .description("Check a description for grammar errors and warnings")
  .argument("<folder>", "Description folder (rule files or description.json)")
  .option("-j, --json", "Output the full result as JSON")
  .action(async (folder: string, options: { json?: boolean }) => {
    const description = await loadDescription(folder).catch((err: unknown) => {
      if (err instanceof DescriptionLoadError) {
        exitWithError(`Cannot load description: ${err.message}`, [`Check ${err.file} in ${folder}`]);
      }
      throw err;
    });

    const result = validate(description);
    if (options.json) {
      console.log(JSON.stringify(result, null, 2));
    } else {
      for (const line of formatIssues(result)) console.log(line);
      console.log(
        result.valid
          ? `✓ ${description.name}: valid (${result.warnings.length} warning(s))`
          : `✗ ${description.name}: ${result.errors.length} error(s), ${result.warnings.length} warning(s)`
      );
    }
    if (!result.valid) process.exitCode = 1;
  });
