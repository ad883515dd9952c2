/**
 * ModelGenerator - Renders templates into formatted source files
 *
 * Rendering output passes through the syntax gate before anything is
 * written, so a malformed hook never reaches the file system.
 */

import { promises as fs } from 'fs';
import { dirname } from 'path';
import type { Logger } from 'pino';
import { FormatError, GenerationError } from '../types/errors.js';
import { GoSyntaxError, formatSource } from '../golang/index.js';
import { createSilentLogger } from '../utils/logger.js';
import type { ModelTemplate } from './template-builder.js';
import type { TemplateContext } from './template-context.js';

/**
 * Sink for dry-run output
 */
export interface OutputStream {
  write(chunk: string): unknown;
}

/**
 * Options for the model generator
 */
export interface ModelGeneratorOptions {
  /** Send formatted files to `output` instead of writing them */
  dryRun?: boolean;
  logger?: Logger;
  /** Dry-run sink, standard output by default */
  output?: OutputStream;
}

export class ModelGenerator {
  private readonly dryRun: boolean;
  private readonly logger: Logger;
  private readonly output: OutputStream;

  constructor(options: ModelGeneratorOptions = {}) {
    this.dryRun = options.dryRun ?? false;
    this.logger = options.logger ?? createSilentLogger();
    this.output = options.output ?? process.stdout;
  }

  get isDryRun(): boolean {
    return this.dryRun;
  }

  /**
   * Renders a template and returns the source in canonical layout
   *
   * @throws {FormatError} When rendering fails (phase `render`) or the
   * rendered text is not well-formed source (phase `validate`)
   */
  format<H extends string>(template: ModelTemplate<H>, context: TemplateContext): string {
    let rendered: string;
    try {
      rendered = template.render(context);
    } catch (error) {
      throw new FormatError(
        `Failed to render template ${template.name}: ${error instanceof Error ? error.message : String(error)}`,
        'render',
        { template: template.name },
        error instanceof Error ? error : undefined
      );
    }

    let formatted: string;
    try {
      formatted = formatSource(rendered);
    } catch (error) {
      if (error instanceof GoSyntaxError) {
        throw new FormatError(
          `Template ${template.name} produced invalid source: ${error.message}`,
          'validate',
          { template: template.name, line: error.line, column: error.column + 1 },
          error
        );
      }
      throw new FormatError(
        `Template ${template.name} could not be checked: ${error instanceof Error ? error.message : String(error)}`,
        'validate',
        { template: template.name },
        error instanceof Error ? error : undefined
      );
    }

    this.logger.debug({ template: template.name, length: formatted.length }, 'formatted template');
    return formatted;
  }

  /**
   * Formats a template and writes it to `destination`. Nothing is written
   * when formatting fails.
   *
   * @throws {FormatError} When the template does not format
   * @throws {GenerationError} When the file cannot be written
   */
  async generate<H extends string>(
    destination: string,
    template: ModelTemplate<H>,
    context: TemplateContext
  ): Promise<void> {
    const content = this.format(template, context);
    await this.write(destination, content);
  }

  /**
   * Persists formatted content, creating the parent directory if needed
   */
  async write(destination: string, content: string): Promise<void> {
    if (this.dryRun) {
      this.output.write(content);
      this.logger.info({ destination }, 'dry run, not writing file');
      return;
    }

    try {
      await fs.mkdir(dirname(destination), { recursive: true });
      await fs.writeFile(destination, content, 'utf-8');
    } catch (error) {
      throw new GenerationError(
        `Failed to write file ${destination}: ${error instanceof Error ? error.message : String(error)}`,
        undefined,
        { destination },
        error instanceof Error ? error : undefined
      );
    }

    this.logger.info({ destination }, 'wrote generated file');
  }
}
