export { defineConfig, loadTextDomainConfig, parseConfig } from "./config.js";
export { fixSource, lintSource } from "./host/fixer.js";
export type { FixOptions, FixResult } from "./host/fixer.js";
export { SourceFile } from "./host/source-file.js";
export {
  getCallArguments,
  resolveTextDomainArgument,
} from "./rule/arguments.js";
export {
  createTextDomainRule,
  inspectCallSite,
  scanTokens,
  stripQuotes,
} from "./rule/text-domain.js";
export {
  isTranslationFunction,
  TRANSLATION_FUNCTIONS,
} from "./rule/translation-functions.js";
export { run } from "./runner.js";
export type { RunOptions } from "./runner.js";
export { tokenize } from "./tokenizer/lexer.js";
export type {
  Diagnostic,
  FileReport,
  Finding,
  LintRule,
  RuleFile,
  RunResult,
  TextDomainConfig,
  TextDomainOptions,
  TextDomainUserConfig,
  Token,
  TokenIndex,
  TokenKind,
} from "./types.js";
