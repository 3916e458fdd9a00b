// src/services/prompt/TemplateRegistry.ts
import * as Mustache from 'mustache';
import { TemplateCategory, TemplateInfo } from '../../types/analysis.types';
import { InvalidInputError, TemplateNotFoundError } from '../../utils/errors';
import { describeError } from '../../utils/logger';

export type TemplateView = Record<string, unknown>;

export interface RegisteredTemplate {
  name: string;
  body: string;
  version: string;
  category: TemplateCategory;
}

export interface RegisterOptions {
  version?: string;
  category?: TemplateCategory;
}

type RenderFn = (text: string) => string;
type Lambda = (text: string, render: RenderFn) => string;

const DEFAULT_TRUNCATE_LENGTH = 80;

function lookup(view: TemplateView, path: string): unknown {
  let current: unknown = view;
  for (const key of path.split('.')) {
    if (typeof current !== 'object' || current === null) {
      return undefined;
    }
    current = Reflect.get(current, key);
  }
  return current;
}

/**
 * Mustache lambdas available to every template:
 *   {{#join}}listKey{{/join}}       list joined with ", "
 *   {{#upper}}..{{/upper}}, {{#lower}}..{{/lower}}
 *   {{#truncate}}..{{/truncate}}    first `truncateLength` chars (default 80) + "..."
 *   {{#default}}..{{/default}}      "N/A" when the rendered text is blank
 */
export function templateHelpers(view: TemplateView): Record<string, () => Lambda> {
  return {
    join: () => (text, render) => {
      const value = lookup(view, text.trim());
      if (Array.isArray(value)) {
        return value.map(item => String(item)).join(', ');
      }
      return render(text);
    },
    upper: () => (text, render) => render(text).toUpperCase(),
    lower: () => (text, render) => render(text).toLowerCase(),
    truncate: () => (text, render) => {
      const limit = typeof view.truncateLength === 'number' ? view.truncateLength : DEFAULT_TRUNCATE_LENGTH;
      const rendered = render(text);
      return rendered.length > limit ? rendered.slice(0, limit) + '...' : rendered;
    },
    default: () => (text, render) => {
      const rendered = render(text).trim();
      return rendered ? rendered : 'N/A';
    }
  };
}

/**
 * Prompts are plain text, so variable tags render unescaped. Section,
 * comment, partial and delimiter tags keep their double braces.
 */
export function toUnescapedTemplate(template: string): string {
  return template
    .replace(/\{\{\{/g, '<<<TRIPLE_OPEN>>>')
    .replace(/\}\}\}/g, '<<<TRIPLE_CLOSE>>>')
    .replace(/\{\{([^#/^!>&={][^}]*)\}\}/g, '{{{$1}}}')
    .replace(/<<<TRIPLE_OPEN>>>/g, '{{{')
    .replace(/<<<TRIPLE_CLOSE>>>/g, '}}}');
}

/**
 * Named Mustache templates. Writers swap in a fresh map, so a render always
 * sees one consistent snapshot and an overwrite replaces the entry whole.
 */
export class TemplateRegistry {
  private templates: ReadonlyMap<string, RegisteredTemplate> = new Map();
  private readonly defaultVersion: string;

  constructor(defaultVersion = 'v1') {
    this.defaultVersion = defaultVersion;
  }

  register(name: string, body: string, options: RegisterOptions = {}): void {
    if (!name || !name.trim()) {
      throw new InvalidInputError('template name is required');
    }
    if (!body || !body.trim()) {
      throw new InvalidInputError(`template ${name} body is required`);
    }

    const compiled = toUnescapedTemplate(body);
    try {
      Mustache.parse(compiled);
    } catch (error) {
      throw new InvalidInputError(`malformed template ${name}: ${describeError(error)}`);
    }

    const next = new Map(this.templates);
    next.set(name, {
      name,
      body: compiled,
      version: options.version ?? this.defaultVersion,
      category: options.category ?? 'custom'
    });
    this.templates = next;
  }

  has(name: string): boolean {
    return this.templates.has(name);
  }

  get(name: string): RegisteredTemplate | undefined {
    return this.templates.get(name);
  }

  render(name: string, view: TemplateView = {}): string {
    const template = this.templates.get(name);
    if (!template) {
      throw new TemplateNotFoundError(name);
    }
    return Mustache.render(template.body, { ...templateHelpers(view), ...view });
  }

  list(): TemplateInfo[] {
    return [...this.templates.values()]
      .map(({ name, version, category }) => ({ name, version, category }))
      .sort((a, b) => a.name.localeCompare(b.name));
  }
}
