import { promises as fs } from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { errorMessage } from '../utils/errors.js';

const __dirname = path.dirname(fileURLToPath(import.meta.url));
// src/services (sources) and dist/services (build) both sit two levels below the project root
export const DEFAULT_TEMPLATES_DIR = path.resolve(__dirname, '..', '..', 'templates');
export const DEFAULT_TEMPLATE = 'tps-report.txt';

const PLACEHOLDER = /\{\{\s*([A-Za-z_][A-Za-z0-9_]*)\s*\}\}/g;

export class TemplateError extends Error {
  constructor(
    message: string,
    public readonly missing: string[] = [],
  ) {
    super(message);
    this.name = 'TemplateError';
  }
}

/**
 * Replace {{ name }} placeholders with context values.
 * Every placeholder must have a value; unknown names raise TemplateError.
 */
export function renderTemplate(source: string, context: Readonly<Record<string, string>>): string {
  const missing = new Set<string>();
  const rendered = source.replace(PLACEHOLDER, (match, name: string) => {
    if (!Object.hasOwn(context, name)) {
      missing.add(name);
      return match;
    }
    return context[name];
  });
  if (missing.size) {
    const names = Array.from(missing);
    throw new TemplateError(`Template references unknown fields: ${names.join(', ')}`, names);
  }
  return rendered;
}

/**
 * Loads templates from a directory and renders them against a flat context.
 */
export class TemplateRenderer {
  constructor(private readonly templatesDir: string = DEFAULT_TEMPLATES_DIR) {}

  async render(templateName: string, context: Readonly<Record<string, string>>): Promise<string> {
    const file = path.join(this.templatesDir, templateName);
    let source: string;
    try {
      source = await fs.readFile(file, 'utf-8');
    } catch (err) {
      throw new TemplateError(`Could not read template ${file}: ${errorMessage(err)}`);
    }
    return renderTemplate(source, context);
  }
}
