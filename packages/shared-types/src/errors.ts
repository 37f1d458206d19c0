import type { DerivationStage } from "./schema.js";

/**
 * Base class for every failure that aborts a derivation.
 * `stage` is the state the derivation could not reach; `subject` names the
 * node label or rule that caused it.
 */
export class DerivationError extends Error {
  code: string;
  stage: DerivationStage;
  subject: string;
  constructor(code: string, stage: DerivationStage, subject: string, message: string) {
    super(message);
    this.name = "DerivationError";
    this.code = code;
    this.stage = stage;
    this.subject = subject;
  }
}

/** Malformed or incomplete phrase-structure rules */
export class GrammarError extends DerivationError {
  constructor(subject: string, message: string) {
    super("GRAMMAR_ERROR", "built", subject, message);
    this.name = "GrammarError";
  }
}

export class NoAttachmentSiteError extends DerivationError {
  constructor(subject: string, message: string) {
    super("NO_ATTACHMENT_SITE", "attached", subject, message);
    this.name = "NoAttachmentSiteError";
  }
}

export class TemplateError extends DerivationError {
  constructor(subject: string, message: string) {
    super("TEMPLATE_ERROR", "filled", subject, message);
    this.name = "TemplateError";
  }
}

export class VocabularyInsertionError extends DerivationError {
  constructor(subject: string, message: string) {
    super("VOCABULARY_INSERTION_ERROR", "inserted", subject, message);
    this.name = "VocabularyInsertionError";
  }
}

/** A description file could not be read or parsed */
export class DescriptionLoadError extends Error {
  file: string;
  line: number | null;
  constructor(file: string, line: number | null, message: string) {
    super(line === null ? `${file}: ${message}` : `${file}:${line}: ${message}`);
    this.name = "DescriptionLoadError";
    this.file = file;
    this.line = line;
  }
}
