/**
 * TemplateBuilder - Composable templates for generated model files
 *
 * A ModelTemplate is a fixed Handlebars skeleton with named hook sections.
 * The skeleton includes each hook as a partial, every hook defaults to empty
 * and callers can replace any of them before rendering. Rendering builds a
 * fresh Handlebars environment each time, so templates share no state.
 */

import Handlebars from 'handlebars';
import type { FieldSpec, TableSchema } from '../types/index.js';
import { DuplicateFieldError, GenerationError, HookParseError } from '../types/errors.js';
import { ACRONYMS, fieldName, isIdentifier, structName as toStructName, tag } from './name-normalizer.js';
import { TypeMapper } from './type-mapper.js';
import { TemplateContext } from './template-context.js';

/**
 * Header placed at the top of every generated file
 */
export const GENERATED_HEADER = `// Code generated by "ovsdb-modelgen"
// DO NOT EDIT.`;

/**
 * Column holding the row identifier
 */
export const IDENTITY_COLUMN = '_uuid';

/**
 * Field generated for the row identifier of every table
 */
export const IDENTITY_FIELD: FieldSpec = Object.freeze({
    Name: 'UUID',
    Type: 'string',
    Tag: IDENTITY_COLUMN,
});

/**
 * Hook sections of a table template, in the order they appear in the output
 */
export const TABLE_HOOKS = ['preStructDefinitions', 'extraFields', 'postStructDefinitions'] as const;

export type TableHook = (typeof TABLE_HOOKS)[number];

const TABLE_TEMPLATE = `${GENERATED_HEADER}

package {{PackageName}}

{{> preStructDefinitions}}
// {{StructName}} defines an object in {{TableName}} table
type {{StructName}} struct {
{{#each Fields}}
	{{Name}} {{Type}} \`{{tag Tag}}\`
{{/each}}
{{> extraFields}}
}

{{> postStructDefinitions}}
`;

// generated source is not HTML
const COMPILE_OPTIONS = {
    noEscape: true,
};

/**
 * A named skeleton plus the hook sections `H` it includes
 */
export class ModelTemplate<H extends string> {
    private readonly sections: Map<H, string>;

    constructor(
        readonly name: string,
        private readonly skeleton: string,
        hooks: readonly H[]
    ) {
        parseSection(skeleton, name);
        this.sections = new Map(hooks.map(hook => [hook, '']));
    }

    /**
     * Names of the hooks this template accepts
     */
    get hooks(): H[] {
        return Array.from(this.sections.keys());
    }

    /**
     * Replaces the body of a hook section
     *
     * @throws {HookParseError} When the hook is unknown or its source is not
     * valid template syntax
     */
    define(hook: H, source: string): this {
        if (!this.sections.has(hook)) {
            throw new HookParseError(`Template ${this.name} has no section named "${hook}"`, hook, {
                template: this.name,
                hooks: this.hooks,
            });
        }
        parseSection(source, hook);
        this.sections.set(hook, source);
        return this;
    }

    /**
     * Current source of a hook section
     */
    section(hook: H): string {
        return this.sections.get(hook) ?? '';
    }

    /**
     * Renders the template against a context. Neither the template nor the
     * context is modified.
     */
    render(context: TemplateContext): string {
        const env = Handlebars.create();
        env.registerHelper('tag', (column: unknown) => (typeof column === 'string' ? tag(column) : ''));

        for (const [hook, source] of this.sections) {
            env.registerPartial(hook, env.compile(source, COMPILE_OPTIONS));
        }

        const compiled = env.compile(this.skeleton, COMPILE_OPTIONS);
        return compiled(context.toObject());
    }
}

/**
 * Options for a TemplateBuilder
 */
export interface TemplateBuilderOptions {
    /** Acronyms kept upper-cased in field and struct names */
    acronyms?: ReadonlySet<string>;
    /** Maps column types to field types */
    typeMapper?: TypeMapper;
}

/**
 * Options for building a table template
 */
export interface TableTemplateOptions {
    /** Struct name to use instead of the normalized table name */
    structName?: string;
    /** Acronyms kept upper-cased in field and struct names */
    acronyms?: ReadonlySet<string>;
}

/**
 * Table template together with its pre-populated context
 */
export interface TableTemplate {
    template: ModelTemplate<TableHook>;
    context: TemplateContext;
}

/**
 * TemplateBuilder class for building the templates of table models
 */
export class TemplateBuilder {
    private options: Required<TemplateBuilderOptions>;

    constructor(options: TemplateBuilderOptions = {}) {
        this.options = {
            acronyms: options.acronyms ?? ACRONYMS,
            typeMapper: options.typeMapper ?? new TypeMapper(),
        };
    }

    /**
     * Builds the template and context generating the model of one table
     *
     * @throws {GenerationError} When the struct name is not an identifier
     * @throws {UnrecognizedTypeError} When a column type cannot be mapped
     * @throws {DuplicateFieldError} When two columns normalize to one field name
     */
    buildTable(packageName: string, tableName: string, table: TableSchema, structName?: string): TableTemplate {
        const name = structName ?? this.structName(tableName);
        if (!isIdentifier(name)) {
            throw new GenerationError(`Table name "${tableName}" does not produce a valid struct name`, tableName, {
                structName: name,
            });
        }

        const context = new TemplateContext([
            ['PackageName', packageName],
            ['StructName', name],
            ['TableName', tableName],
            ['Fields', this.buildFields(tableName, table)],
        ]);

        const template = new ModelTemplate<TableHook>(`${tableName}Table`, TABLE_TEMPLATE, TABLE_HOOKS);
        return { template, context };
    }

    /**
     * Derives the fields of a table: the identity field first, then one field
     * per column ordered by field name
     */
    buildFields(tableName: string, table: TableSchema): FieldSpec[] {
        const fields: FieldSpec[] = [];
        const owners = new Map<string, string>([[IDENTITY_FIELD.Name, IDENTITY_COLUMN]]);

        for (const [column, schema] of Object.entries(table.columns)) {
            if (column === IDENTITY_COLUMN) {
                continue;
            }

            const name = fieldName(column, this.options.acronyms);
            if (!isIdentifier(name)) {
                throw new GenerationError(
                    `Column "${column}" of table ${tableName} does not produce a valid field name`,
                    tableName,
                    { column, fieldName: name }
                );
            }

            const owner = owners.get(name);
            if (owner !== undefined) {
                throw new DuplicateFieldError(name, [owner, column], tableName);
            }
            owners.set(name, column);

            fields.push({
                Name: name,
                Type: this.options.typeMapper.fieldType(schema, { tableName, columnName: column }),
                Tag: column,
            });
        }

        fields.sort((a, b) => (a.Name < b.Name ? -1 : a.Name > b.Name ? 1 : 0));
        return [IDENTITY_FIELD, ...fields];
    }

    /**
     * Struct name generated for a table
     */
    structName(tableName: string): string {
        return toStructName(tableName, this.options.acronyms);
    }
}

/**
 * Builds the template and context generating the model of one table
 *
 * @throws {GenerationError} When the struct name is not an identifier
 * @throws {UnrecognizedTypeError} When a column type cannot be mapped
 * @throws {DuplicateFieldError} When two columns normalize to one field name
 */
export function buildTableTemplate(
    packageName: string,
    tableName: string,
    table: TableSchema,
    options: TableTemplateOptions = {}
): TableTemplate {
    return new TemplateBuilder({ acronyms: options.acronyms }).buildTable(
        packageName,
        tableName,
        table,
        options.structName
    );
}

/**
 * Derives the fields of a table with the default type map
 */
export function buildFields(
    tableName: string,
    table: TableSchema,
    acronyms: ReadonlySet<string> = ACRONYMS
): FieldSpec[] {
    return new TemplateBuilder({ acronyms }).buildFields(tableName, table);
}

function parseSection(source: string, sectionName: string): void {
    try {
        Handlebars.parse(source);
    } catch (error) {
        throw new HookParseError(
            `Section "${sectionName}" is not a valid template: ${error instanceof Error ? error.message : String(error)}`,
            sectionName,
            undefined,
            error instanceof Error ? error : undefined
        );
    }
}
