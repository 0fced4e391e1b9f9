// SPDX-License-Identifier: Apache-2.0

import fs from 'node:fs/promises';
import path from 'node:path';
import {inject, injectable} from 'tsyringe-neo';
import {InjectTokens} from './dependency-injection/inject-tokens.js';
import {patchInject} from './dependency-injection/container-helper.js';
import {TemplateRenderError} from './errors/template-render-error.js';

export type TemplateValues = Readonly<Record<string, string>>;

const PLACEHOLDER: RegExp = /{{\s*\.([A-Za-z_][\w]*)\s*}}/g;
const OPEN_DELIMITER: string = '{{';
const CLOSE_DELIMITER: string = '}}';

/**
 * Renders `{{.key}}` placeholders in configuration templates.
 */
@injectable()
export class TemplateRenderer {
  private readonly templatesDirectory: string;

  public constructor(@inject(InjectTokens.TemplatesDirectory) templatesDirectory?: string) {
    this.templatesDirectory = patchInject(templatesDirectory, InjectTokens.TemplatesDirectory, this.constructor.name);
  }

  /**
   * Reads a template file and renders it.
   *
   * @param templateName - file name relative to the templates directory
   * @param values - placeholder values
   * @param directory - directory to read from, the templates directory when absent
   */
  public async renderFile(templateName: string, values: TemplateValues, directory?: string): Promise<string> {
    let text: string;
    try {
      text = await fs.readFile(path.join(directory ?? this.templatesDirectory, templateName), 'utf8');
    } catch (error) {
      throw new TemplateRenderError('unable to parse template', templateName, error);
    }
    return TemplateRenderer.render(text, values, templateName);
  }

  /**
   * Replaces every `{{.key}}` with its value.
   *
   * @throws TemplateRenderError - a delimiter is left unbalanced, or a placeholder has no value
   */
  public static render(text: string, values: TemplateValues, templateName: string = 'inline'): string {
    TemplateRenderer.checkDelimiters(text, templateName);

    return text.replaceAll(PLACEHOLDER, (_match: string, key: string): string => {
      const value: string | undefined = values[key];
      if (value === undefined) {
        throw new TemplateRenderError(`unable to execute template: no value for key "${key}"`, templateName);
      }
      return value;
    });
  }

  private static checkDelimiters(text: string, templateName: string): void {
    let cursor: number = text.indexOf(OPEN_DELIMITER);
    while (cursor !== -1) {
      const close: number = text.indexOf(CLOSE_DELIMITER, cursor + OPEN_DELIMITER.length);
      const nextOpen: number = text.indexOf(OPEN_DELIMITER, cursor + OPEN_DELIMITER.length);
      if (close === -1 || (nextOpen !== -1 && nextOpen < close)) {
        throw new TemplateRenderError(`unable to parse template: unclosed action at offset ${cursor}`, templateName);
      }
      cursor = text.indexOf(OPEN_DELIMITER, close + CLOSE_DELIMITER.length);
    }
  }
}
