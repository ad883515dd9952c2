/**
 * DatabaseModelGenerator - Generates the model package of a whole database
 *
 * One file per table plus `model.go`, which registers every table struct
 * with the client. All files are formatted before the first one is
 * written.
 */

import { join } from 'path';
import type { Logger } from 'pino';
import type { ContextRecord, DatabaseSchema, GenerationConfig, GenerationResult } from '../types/index.js';
import { GenerationError } from '../types/errors.js';
import { createSilentLogger } from '../utils/logger.js';
import { DEFAULT_MODEL_IMPORT } from '../utils/config.js';
import { validateGenerationConfig } from '../utils/validation.js';
import { ACRONYMS, createAcronymSet, fileName, structName } from './name-normalizer.js';
import { GENERATED_HEADER, ModelTemplate, TemplateBuilder, type TableHook } from './template-builder.js';
import { TemplateContext } from './template-context.js';
import { ModelGenerator, type OutputStream } from './model-generator.js';

/**
 * File holding the database model
 */
export const MODEL_FILE = 'model.go';

export const DATABASE_MODEL_HOOKS = ['preModelDefinitions', 'postModelDefinitions'] as const;

export type DatabaseModelHook = (typeof DATABASE_MODEL_HOOKS)[number];

const DATABASE_MODEL_TEMPLATE = `${GENERATED_HEADER}

package {{PackageName}}

import (
	model "{{ModelImport}}"
)

{{> preModelDefinitions}}
// FullDatabaseModel returns the DatabaseModel object to be used by the client
func FullDatabaseModel() (*model.DBModel, error) {
	return model.NewDBModel("{{DatabaseName}}", map[string]model.Model{
{{#each Tables}}
		"{{TableName}}": &{{StructName}}{},
{{/each}}
	})
}

{{> postModelDefinitions}}
`;

export interface DatabaseModelTemplateOptions {
  /** Import path of the client model package */
  modelImport?: string;
  acronyms?: ReadonlySet<string>;
}

export interface DatabaseModelTemplate {
  template: ModelTemplate<DatabaseModelHook>;
  context: TemplateContext;
}

/**
 * Builds the template and context generating the database model, with
 * tables ordered by name
 */
export function buildDatabaseModelTemplate(
  packageName: string,
  schema: DatabaseSchema,
  options: DatabaseModelTemplateOptions = {}
): DatabaseModelTemplate {
  const acronyms = options.acronyms ?? ACRONYMS;
  const tables: ContextRecord[] = sortedTableNames(schema).map(tableName => ({
    TableName: tableName,
    StructName: structName(tableName, acronyms),
  }));

  const context = new TemplateContext([
    ['PackageName', packageName],
    ['DatabaseName', schema.name],
    ['ModelImport', options.modelImport ?? DEFAULT_MODEL_IMPORT],
    ['Tables', tables],
  ]);

  const template = new ModelTemplate<DatabaseModelHook>('DBModel', DATABASE_MODEL_TEMPLATE, DATABASE_MODEL_HOOKS);
  return { template, context };
}

/**
 * Customizes a table template before it is formatted
 */
export type TableExtension = (tableName: string, template: ModelTemplate<TableHook>, context: TemplateContext) => void;

/**
 * Customizes the database model template before it is formatted
 */
export type DatabaseModelExtension = (template: ModelTemplate<DatabaseModelHook>, context: TemplateContext) => void;

export interface GenerateAllOptions {
  extend?: TableExtension;
  extendModel?: DatabaseModelExtension;
}

/**
 * A formatted file ready to be written
 */
export interface GeneratedFile {
  /** File path relative to the output directory */
  path: string;
  content: string;
  /** Source table, absent for the database model */
  tableName?: string;
}

export interface RenderedModel {
  files: GeneratedFile[];
  warnings: string[];
}

export interface DatabaseModelGeneratorOptions {
  config: GenerationConfig;
  logger?: Logger;
  /** Dry-run sink */
  output?: OutputStream;
}

export class DatabaseModelGenerator {
  private readonly config: GenerationConfig;
  private readonly logger: Logger;
  private readonly acronyms: ReadonlySet<string>;
  private readonly builder: TemplateBuilder;
  private readonly generator: ModelGenerator;

  constructor(options: DatabaseModelGeneratorOptions) {
    this.config = validateGenerationConfig(options.config);
    this.logger = options.logger ?? createSilentLogger();
    this.acronyms = createAcronymSet(this.config.acronyms);
    this.builder = new TemplateBuilder({ acronyms: this.acronyms });
    this.generator = new ModelGenerator({
      dryRun: this.config.dryRun,
      logger: this.logger,
      output: options.output,
    });
  }

  /**
   * Gets the output path for generated files
   */
  getOutputPath(): string {
    return this.config.outputDir;
  }

  /**
   * Formats every file of the model without writing anything
   *
   * @throws {GenerationError} When a table cannot be generated
   */
  render(schema: DatabaseSchema, options: GenerateAllOptions = {}): RenderedModel {
    const warnings: string[] = [];
    const files = this.renderFiles(schema, options, warnings);
    return { files, warnings };
  }

  private renderFiles(schema: DatabaseSchema, options: GenerateAllOptions, warnings: string[]): GeneratedFile[] {
    const { packageName } = this.config;
    const files: GeneratedFile[] = [];
    const fileOwners = new Map<string, string>([[MODEL_FILE, 'the database model']]);
    const structOwners = new Map<string, string>();

    for (const tableName of sortedTableNames(schema)) {
      const table = schema.tables[tableName];
      if (Object.keys(table.columns).length === 0) {
        warnings.push(`Table ${tableName} has no columns`);
      }

      const path = fileName(tableName);
      claim(fileOwners, path, tableName, 'file');

      try {
        const { template, context } = this.builder.buildTable(packageName, tableName, table);
        claim(structOwners, context.getString('StructName'), tableName, 'struct');
        options.extend?.(tableName, template, context);
        files.push({ path, content: this.generator.format(template, context), tableName });
      } catch (error) {
        if (error instanceof GenerationError) {
          throw error;
        }
        throw new GenerationError(
          `Failed to generate table ${tableName}: ${error instanceof Error ? error.message : String(error)}`,
          tableName,
          { file: path },
          error instanceof Error ? error : undefined
        );
      }
    }

    const model = buildDatabaseModelTemplate(packageName, schema, {
      modelImport: this.config.modelImport,
      acronyms: this.acronyms,
    });
    try {
      options.extendModel?.(model.template, model.context);
      files.push({ path: MODEL_FILE, content: this.generator.format(model.template, model.context) });
    } catch (error) {
      throw new GenerationError(
        `Failed to generate the database model: ${error instanceof Error ? error.message : String(error)}`,
        undefined,
        { file: MODEL_FILE },
        error instanceof Error ? error : undefined
      );
    }

    return files;
  }

  /**
   * Generates and writes the model package of a database. Nothing is written
   * unless every file formats.
   */
  async generateAll(schema: DatabaseSchema, options: GenerateAllOptions = {}): Promise<GenerationResult> {
    const warnings: string[] = [];
    try {
      const files = this.renderFiles(schema, options, warnings);
      for (const warning of warnings) {
        this.logger.warn({ database: schema.name }, warning);
      }

      for (const file of files) {
        await this.generator.write(join(this.config.outputDir, file.path), file.content);
      }

      this.logger.info(
        { database: schema.name, files: files.length, dryRun: this.generator.isDryRun },
        'generated database model'
      );
      return {
        success: true,
        generatedFiles: files.map(file => file.path),
        warnings,
      };
    } catch (error) {
      this.logger.error({ err: error, database: schema.name }, 'database model generation failed');
      return {
        success: false,
        generatedFiles: [],
        warnings,
        error:
          error instanceof GenerationError
            ? error
            : new GenerationError(
                `Model generation failed: ${error instanceof Error ? error.message : String(error)}`,
                undefined,
                { database: schema.name },
                error instanceof Error ? error : undefined
              ),
      };
    }
  }
}

function sortedTableNames(schema: DatabaseSchema): string[] {
  return Object.keys(schema.tables).sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
}

function claim(owners: Map<string, string>, name: string, tableName: string, what: 'file' | 'struct'): void {
  const existing = owners.get(name);
  if (existing !== undefined) {
    throw new GenerationError(`Table ${tableName} generates ${what} ${name}, already generated by ${existing}`, tableName, {
      [what]: name,
      conflictsWith: existing,
    });
  }
  owners.set(name, `table ${tableName}`);
}
