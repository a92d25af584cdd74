import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import type { Template } from '../../types/index.js';
import { ErrorCodes, StrategicError } from '../../types/index.js';
import { DEFAULT_TEMPLATE_ID } from '../../constants/index.js';
import { ValidationError } from '../../utils/errors.js';
import { parseTemplate, templateHasTag } from './template.js';

/**
 * Static, in-memory table of installable templates
 */
export class TemplateRegistry {
  private readonly templates: Map<string, Template>;

  constructor(templates: Template[], private readonly defaultId: string = DEFAULT_TEMPLATE_ID) {
    this.templates = new Map();
    for (const template of templates) {
      if (this.templates.has(template.id)) {
        throw new ValidationError(`duplicate template id '${template.id}'`, { id: template.id });
      }
      this.templates.set(template.id, template);
    }
  }

  has(id: string): boolean {
    return this.templates.has(id);
  }

  get(id: string): Template {
    const template = this.templates.get(id);
    if (!template) {
      throw new StrategicError(
        `Template '${id}' not found. Available templates: ${this.ids().join(', ')}`,
        ErrorCodes.TEMPLATE_NOT_FOUND,
        { id }
      );
    }
    return template;
  }

  getDefault(): Template {
    return this.get(this.defaultId);
  }

  /** All templates sorted by id */
  list(): Template[] {
    return [...this.templates.values()].sort((a, b) => a.id.localeCompare(b.id));
  }

  listActive(): Template[] {
    return this.list().filter(template => !template.deprecated);
  }

  filterByLanguage(language: string): Template[] {
    const wanted = language.toLowerCase();
    return this.list().filter(template => template.language?.toLowerCase() === wanted);
  }

  filterByTag(tag: string): Template[] {
    return this.list().filter(template => templateHasTag(template, tag));
  }

  ids(): string[] {
    return this.list().map(template => template.id);
  }
}

let defaultRegistry: TemplateRegistry | undefined;

function loadBundledTemplates(): Template[] {
  const dataPath = fileURLToPath(new URL('./templates.json', import.meta.url));
  const raw: unknown = JSON.parse(readFileSync(dataPath, 'utf8'));
  if (!Array.isArray(raw)) {
    throw new ValidationError(`template registry at ${dataPath} must be an array`);
  }
  return raw.map((entry, index) => parseTemplate(entry, index));
}

export function getTemplateRegistry(): TemplateRegistry {
  defaultRegistry ??= new TemplateRegistry(loadBundledTemplates());
  return defaultRegistry;
}
