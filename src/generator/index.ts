/**
 * Generator module - model source generation from database schemas
 */

export {
  ACRONYMS,
  camelCase,
  createAcronymSet,
  fieldName,
  fileName,
  isIdentifier,
  structName,
  tag
} from './name-normalizer.js';
export {
  ATOMIC_TYPE_MAP,
  atomicType,
  baseTypeName,
  fieldType,
  isAtomicTypeName,
  isOptional,
  isSet,
  TypeMapper,
  type ColumnLocation,
  type TypeMapperOptions
} from './type-mapper.js';
export { TemplateContext, isFieldSpec } from './template-context.js';
export {
  GENERATED_HEADER,
  IDENTITY_COLUMN,
  IDENTITY_FIELD,
  TABLE_HOOKS,
  ModelTemplate,
  TemplateBuilder,
  buildFields,
  buildTableTemplate,
  type TableHook,
  type TableTemplate,
  type TableTemplateOptions,
  type TemplateBuilderOptions
} from './template-builder.js';
export {
  ModelGenerator,
  type ModelGeneratorOptions,
  type OutputStream
} from './model-generator.js';
export {
  DATABASE_MODEL_HOOKS,
  MODEL_FILE,
  DatabaseModelGenerator,
  buildDatabaseModelTemplate,
  type DatabaseModelExtension,
  type DatabaseModelGeneratorOptions,
  type DatabaseModelHook,
  type DatabaseModelTemplate,
  type DatabaseModelTemplateOptions,
  type GenerateAllOptions,
  type GeneratedFile,
  type RenderedModel,
  type TableExtension
} from './database-model.js';
