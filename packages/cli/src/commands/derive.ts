/**
 * Derive command - derive every paradigm cell (or one specification) and
 * write one diagram per derivation step plus the word list.
 */

import { Command, Option } from "commander";
import { DescriptionLoadError } from "@redup/shared-types";
import type { MorphologicalSpec } from "@redup/shared-types";
import { loadDescription } from "@redup/loader";
import { validate, formatIssues } from "@redup/validation";
import type { RenderFormat } from "@redup/render";
import { exitWithError } from "../utils/errorFormatter.js";
import { collect, parseFeatureOptions } from "../utils/features.js";
import { runDerive } from "./deriveAction.js";

interface DeriveCommandOptions {
  input: string;
  output: string;
  format: RenderFormat;
  features: string[];
  cycles?: boolean;
  validate: boolean;
}

export const deriveCommand = new Command("derive")
  .description("Derive base and reduplicated words and render each derivation step")
  .requiredOption("-i, --input <folder>", "Description folder (rule files or description.json)")
  .option("-o, --output <folder>", "Output folder", "output")
  .addOption(new Option("--format <format>", "Diagram format").choices(["svg", "txt"]).default("svg"))
  .option("-f, --features <label=features>", "Derive one specification, e.g. T=past (repeatable)", collect, [])
  .option("--cycles", "Render every vocabulary-insertion cycle as its own step")
  .option("--no-validate", "Skip description validation")
  .addHelpText("after", `
Examples:
  redup derive -i data/tagalog -o out           Whole paradigm as SVG
  redup derive -i data/tagalog --format txt     ASCII trees instead
  redup derive -i data/tagalog -f T=past        One specification
`)
  .action(async (options: DeriveCommandOptions) => {
    const description = await loadDescription(options.input).catch((err: unknown) => {
      if (err instanceof DescriptionLoadError) {
        exitWithError(`Cannot load description: ${err.message}`, [`Check ${err.file} in ${options.input}`]);
      }
      throw err;
    });

    if (options.validate) {
      const result = validate(description);
      if (!result.valid) {
        exitWithError(`Description "${description.name}" has ${result.errors.length} error(s)`, [
          ...formatIssues(result),
          `Run: redup validate ${options.input}`,
        ]);
      }
    }

    let features: MorphologicalSpec | undefined;
    try {
      features = options.features.length > 0 ? parseFeatureOptions(options.features) : undefined;
    } catch (err) {
      exitWithError(err instanceof Error ? err.message : String(err), ["Example: --features T=past"]);
    }

    const summary = await runDerive(description, {
      output: options.output,
      format: options.format,
      ...(features ? { features } : {}),
      ...(options.cycles ? { cycles: true } : {}),
    });

    console.log(`Base words:         ${summary.baseWords.join(", ") || "(none)"}`);
    console.log(`Reduplicated words: ${summary.reduplicatedWords.join(", ") || "(none)"}`);
    console.log(`Wrote ${summary.files.length} file(s) to ${options.output}`);

    for (const f of summary.failed) {
      console.log(`  ✗ ${f.cell.kind} ${f.cell.label}: [${f.error.code}] ${f.error.message}`);
    }

    if (summary.evaluation) {
      const { passed, unexpected, missing } = summary.evaluation;
      console.log("");
      console.log(passed ? "✓ Evaluation passed" : "✗ Evaluation failed");
      if (unexpected.length > 0) console.log(`  Unexpected: ${unexpected.join(", ")}`);
      if (missing.length > 0) console.log(`  Missing:    ${missing.join(", ")}`);
      if (!passed) process.exitCode = 1;
    }
  });
