export { JsonTemplateSerializer } from './json-template-serializer.js';
export {
  keyframeEntrySchema,
  templateFileSchema,
  textTemplateSchema,
} from './template-schema.js';
export type { KeyframeEntryJson, TemplateFileJson, TextTemplateJson } from './template-schema.js';
export { defaultOutputPath, pairedTemplatePath, resolveTemplatePair } from './template-pairing.js';
export type { TemplatePair } from './template-pairing.js';
