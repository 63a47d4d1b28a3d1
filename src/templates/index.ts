export { TemplatesStore, parseTemplateYaml } from './store.js';
export type { TemplateParseResult } from './store.js';
export { compileTemplate } from './compile.js';
export type { CompileOptions } from './compile.js';
export { calculateTemplateDigest, normalizeTemplateForDigest } from './digest.js';
export { BUILTIN_TEMPLATES, DEFAULT_TEMPLATE_NAME } from './builtin.js';
export type { BuiltinTemplate } from './builtin.js';
export { validateTemplateDefinition, isValidTemplateName } from './schema.js';
export type { Template, TemplateDefinition, DateLabelEntry, TemplateLimits, TemplateTitleOptions } from './schema.js';
