/**
 * Configuration templates bundled with the tool.
 */

import { join } from "node:path";
import { fileURLToPath } from "node:url";
import { ConfigurationError, getErrorMessage } from "../errors.js";
import type { FileSystemLayer } from "../platform/filesystem.js";

/** `templates/` at the package root, from both src/ and dist/. */
export const TEMPLATE_DIR = fileURLToPath(new URL("../../../templates/", import.meta.url));

export type TemplateName = "system.yaml" | "access.config.import.yml";

export type TemplateValues = Readonly<Record<string, string>>;

const PLACEHOLDER = /\{\{\s*([A-Za-z][A-Za-z0-9_]*)\s*\}\}/g;

/**
 * Replace every `{{name}}` placeholder with its value.
 *
 * @throws ConfigurationError when a placeholder has no value
 */
export function renderTemplate(template: string, values: TemplateValues): string {
  return template.replace(PLACEHOLDER, (_match, name: string) => {
    const value = values[name];
    if (value === undefined) {
      throw new ConfigurationError(`Template placeholder has no value: ${name}`);
    }
    return value;
  });
}

export interface TemplateStore {
  /**
   * Load and render a bundled template.
   *
   * @throws ConfigurationError when the template is missing or a placeholder has no value
   */
  render(name: TemplateName, values: TemplateValues): Promise<string>;
}

export class DefaultTemplateStore implements TemplateStore {
  constructor(
    private readonly fileSystem: FileSystemLayer,
    private readonly templateDir: string = TEMPLATE_DIR
  ) {}

  async render(name: TemplateName, values: TemplateValues): Promise<string> {
    const path = join(this.templateDir, name);
    let template: string;
    try {
      template = await this.fileSystem.readFile(path);
    } catch (error) {
      throw new ConfigurationError(
        `Cannot read bundled template ${path}: ${getErrorMessage(error)}`
      );
    }
    return renderTemplate(template, values);
  }
}
