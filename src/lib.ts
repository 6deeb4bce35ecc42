export * from './resume/text.js';
export * from './resume/document.js';
export * from './resume/errors.js';
export * from './resume/template.js';
export * from './resume/renderer.js';
export {
  loadResumeDefinition,
  parseResumeDefinition,
  type DefinitionFormat,
  type TextSpec,
} from './resume/loader.js';
export { defaultOutputName, saveResume, type SaveResumeResult } from './export/file.js';
export { cliMain, UsageError } from './cli.js';
