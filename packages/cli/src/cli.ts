/**
 * @redup/cli - reduplication derivations from the command line
 */

import { Command } from "commander";
import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { dirname, join } from "node:path";
import { deriveCommand } from "./commands/derive.js";
import { validateCommand } from "./commands/validate.js";

const __dirname = dirname(fileURLToPath(import.meta.url));
const pkg: unknown = JSON.parse(readFileSync(join(__dirname, "..", "package.json"), "utf-8"));
const version = typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string"
  ? pkg.version
  : "0.0.0";

const program = new Command();

program
  .name("redup")
  .description("Reduplication derivations in Distributed Morphology")
  .version(version);

program.addCommand(deriveCommand);
program.addCommand(validateCommand);

await program.parseAsync();
