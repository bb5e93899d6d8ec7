export {
  DEFAULT_CONFIG,
  configTemplate,
  type ConfigTemplateAnswers,
  type DefaultConfig,
} from './config.js';
export {
  DEFAULT_GRAMMAR_PATH,
  readGrammarFile,
  type GrammarRules,
} from './grammar.js';
export { mkdirSafe, writeFileAtomic } from './utils.js';
export {
  validateProject,
  formatValidation,
  type ValidationCheck,
} from './validation.js';
