/**
 * Integration tests for whole-database model generation
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import {
  DatabaseModelGenerator,
  MODEL_FILE,
  buildDatabaseModelTemplate
} from '../../src/generator/database-model.js';
import { ModelGenerator } from '../../src/generator/model-generator.js';
import {
  FormatError,
  GenerationError,
  UnrecognizedTypeError,
  ValidationError
} from '../../src/types/errors.js';
import type { DatabaseSchema, GenerationConfig } from '../../src/types/index.js';

const schema: DatabaseSchema = {
  name: 'TestDB',
  version: '1.0.0',
  tables: {
    Logical_Switch: {
      columns: {
        name: { type: 'string' },
        ports: {
          type: { key: { type: 'uuid', refTable: 'Logical_Switch_Port' }, min: 0, max: 'unlimited' }
        },
        external_ids: { type: { key: 'string', value: 'string', min: 0, max: 'unlimited' } }
      },
      isRoot: true
    },
    Logical_Switch_Port: {
      columns: {
        name: { type: 'string' },
        tag: { type: { key: { type: 'integer', minInteger: 1, maxInteger: 4095 }, min: 0, max: 1 } }
      }
    },
    ACL: { columns: {} }
  }
};

const HEADER = ['// Code generated by "ovsdb-modelgen"', '// DO NOT EDIT.', '', 'package nbdb', ''];

async function exists(path: string): Promise<boolean> {
  return fs.access(path).then(
    () => true,
    () => false
  );
}

describe('buildDatabaseModelTemplate', () => {
  it('should list tables in name order with their struct names', () => {
    const { template, context } = buildDatabaseModelTemplate('nbdb', schema);

    expect(template.hooks).toEqual(['preModelDefinitions', 'postModelDefinitions']);
    expect(context.getString('DatabaseName')).toBe('TestDB');
    expect(context.getString('ModelImport')).toBe('github.com/ovn-org/libovsdb/model');
    expect(context.get('Tables')).toEqual([
      { TableName: 'ACL', StructName: 'ACL' },
      { TableName: 'Logical_Switch', StructName: 'LogicalSwitch' },
      { TableName: 'Logical_Switch_Port', StructName: 'LogicalSwitchPort' }
    ]);
  });

  it('should format into the model registration file', () => {
    const { template, context } = buildDatabaseModelTemplate('nbdb', schema, {
      modelImport: 'example.com/client/model'
    });

    expect(new ModelGenerator().format(template, context)).toBe(
      [
        ...HEADER,
        'import (',
        '\tmodel "example.com/client/model"',
        ')',
        '',
        '// FullDatabaseModel returns the DatabaseModel object to be used by the client',
        'func FullDatabaseModel() (*model.DBModel, error) {',
        '\treturn model.NewDBModel("TestDB", map[string]model.Model{',
        '\t\t"ACL":                 &ACL{},',
        '\t\t"Logical_Switch":      &LogicalSwitch{},',
        '\t\t"Logical_Switch_Port": &LogicalSwitchPort{},',
        '\t})',
        '}',
        ''
      ].join('\n')
    );
  });
});

describe('DatabaseModelGenerator', () => {
  let tempDir: string;
  let config: GenerationConfig;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(join(tmpdir(), 'modelgen-database-'));
    config = {
      outputDir: join(tempDir, 'out'),
      packageName: 'nbdb'
    };
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('should write one file per table plus the model file', async () => {
    const generator = new DatabaseModelGenerator({ config });

    const result = await generator.generateAll(schema);

    expect(result).toEqual({
      success: true,
      generatedFiles: ['acl.go', 'logical_switch.go', 'logical_switch_port.go', MODEL_FILE],
      warnings: ['Table ACL has no columns']
    });
    expect((await fs.readdir(config.outputDir)).sort()).toEqual([
      'acl.go',
      'logical_switch.go',
      'logical_switch_port.go',
      'model.go'
    ]);
  });

  it('should generate aligned table structs', async () => {
    const generator = new DatabaseModelGenerator({ config });
    await generator.generateAll(schema);

    const logicalSwitch = await fs.readFile(join(config.outputDir, 'logical_switch.go'), 'utf-8');
    expect(logicalSwitch).toBe(
      [
        ...HEADER,
        '// LogicalSwitch defines an object in Logical_Switch table',
        'type LogicalSwitch struct {',
        '\tUUID        string            `ovs:"_uuid"`',
        '\tExternalIDs map[string]string `ovs:"external_ids"`',
        '\tName        string            `ovs:"name"`',
        '\tPorts       []string          `ovs:"ports"`',
        '}',
        ''
      ].join('\n')
    );

    const port = await fs.readFile(join(config.outputDir, 'logical_switch_port.go'), 'utf-8');
    expect(port).toBe(
      [
        ...HEADER,
        '// LogicalSwitchPort defines an object in Logical_Switch_Port table',
        'type LogicalSwitchPort struct {',
        '\tUUID string `ovs:"_uuid"`',
        '\tName string `ovs:"name"`',
        '\tTag  *int   `ovs:"tag"`',
        '}',
        ''
      ].join('\n')
    );

    const acl = await fs.readFile(join(config.outputDir, 'acl.go'), 'utf-8');
    expect(acl).toBe(
      [
        ...HEADER,
        '// ACL defines an object in ACL table',
        'type ACL struct {',
        '\tUUID string `ovs:"_uuid"`',
        '}',
        ''
      ].join('\n')
    );
  });

  it('should let callers extend individual tables and the model', async () => {
    const generator = new DatabaseModelGenerator({ config });

    const result = await generator.generateAll(schema, {
      extend: (tableName, template) => {
        if (tableName === 'Logical_Switch') {
          template.define(
            'postStructDefinitions',
            '\nfunc (s *{{StructName}}) Table() string {\n\treturn "{{TableName}}"\n}\n'
          );
        }
      },
      extendModel: (template, context) => {
        context.set('Version', schema.version);
        template.define('preModelDefinitions', 'const SchemaVersion = "{{Version}}"\n\n');
      }
    });

    expect(result.success).toBe(true);
    const logicalSwitch = await fs.readFile(join(config.outputDir, 'logical_switch.go'), 'utf-8');
    expect(logicalSwitch.endsWith('}\n\nfunc (s *LogicalSwitch) Table() string {\n\treturn "Logical_Switch"\n}\n')).toBe(
      true
    );
    const port = await fs.readFile(join(config.outputDir, 'logical_switch_port.go'), 'utf-8');
    expect(port).not.toContain('func');

    const model = await fs.readFile(join(config.outputDir, MODEL_FILE), 'utf-8');
    expect(model).toContain(')\n\nconst SchemaVersion = "1.0.0"\n\n// FullDatabaseModel');
  });

  it('should write nothing when any table fails to format', async () => {
    const generator = new DatabaseModelGenerator({ config });

    const result = await generator.generateAll(schema, {
      extend: (tableName, template) => {
        if (tableName === 'Logical_Switch_Port') {
          template.define('extraFields', '\tBroken (\n');
        }
      }
    });

    expect(result.success).toBe(false);
    expect(result.generatedFiles).toEqual([]);
    expect(result.warnings).toEqual(['Table ACL has no columns']);
    expect(result.error).toBeInstanceOf(GenerationError);
    expect(result.error?.tableName).toBe('Logical_Switch_Port');
    expect(result.error?.cause).toBeInstanceOf(FormatError);
    expect(await exists(config.outputDir)).toBe(false);
  });

  it('should report unrecognized column types', async () => {
    const generator = new DatabaseModelGenerator({ config });

    const result = await generator.generateAll({
      name: 'Broken',
      version: '1.0.0',
      tables: { Thing: { columns: { size: { type: 'decimal' } } } }
    });

    expect(result.success).toBe(false);
    expect(result.error).toBeInstanceOf(UnrecognizedTypeError);
    expect(result.error?.message).toBe('Unrecognized type "decimal" for column Thing.size');
  });

  it('should reject tables generating the same file or struct', async () => {
    const generator = new DatabaseModelGenerator({ config });
    const columns = { name: { type: 'string' } };

    const sameFile = await generator.generateAll({
      name: 'Clash',
      version: '1.0.0',
      tables: { Bridge: { columns }, bridge: { columns } }
    });
    expect(sameFile.error?.message).toBe('Table bridge generates file bridge.go, already generated by table Bridge');

    const sameStruct = await generator.generateAll({
      name: 'Clash',
      version: '1.0.0',
      tables: { foo_bar: { columns }, 'foo-bar': { columns } }
    });
    expect(sameStruct.error?.message).toBe(
      'Table foo_bar generates struct FooBar, already generated by table foo-bar'
    );

    const modelFile = await generator.generateAll({
      name: 'Clash',
      version: '1.0.0',
      tables: { Model: { columns } }
    });
    expect(modelFile.error?.message).toBe(
      'Table Model generates file model.go, already generated by the database model'
    );
  });

  it('should print every file in dry-run mode without writing', async () => {
    const chunks: string[] = [];
    const generator = new DatabaseModelGenerator({
      config: { ...config, dryRun: true },
      output: { write: chunk => chunks.push(chunk) }
    });

    const result = await generator.generateAll(schema);

    expect(result.success).toBe(true);
    expect(chunks).toHaveLength(4);
    expect(chunks[3]).toContain('func FullDatabaseModel()');
    expect(await exists(config.outputDir)).toBe(false);
  });

  it('should use configured acronyms and model import', async () => {
    const generator = new DatabaseModelGenerator({
      config: { ...config, acronyms: ['nb'], modelImport: 'example.com/client/model' }
    });

    const { files } = generator.render({
      name: 'TestDB',
      version: '1.0.0',
      tables: { NB_Global: { columns: { nb_cfg: { type: 'integer' } } } }
    });

    expect(files.map(file => file.path)).toEqual(['nb_global.go', MODEL_FILE]);
    expect(files[0].content).toContain('type NBGlobal struct {\n\tUUID  string `ovs:"_uuid"`\n\tNBCfg int    `ovs:"nb_cfg"`\n}');
    expect(files[1].content).toContain('\tmodel "example.com/client/model"\n');
  });

  it('should validate its configuration', () => {
    expect(() => new DatabaseModelGenerator({ config: { ...config, packageName: 'my-models' } })).toThrow(
      ValidationError
    );
    expect(new DatabaseModelGenerator({ config }).getOutputPath()).toBe(config.outputDir);
  });
});
