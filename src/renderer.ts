import Handlebars from 'handlebars';

import { ValidationError } from './errors.js';
import type { TemplateDefinition } from './schemas.js';

export interface ITemplatingEngine {
  render(template: string, variables: Record<string, string>): string;
}

export class HandlebarsTemplatingEngine implements ITemplatingEngine {
  render(template: string, variables: Record<string, string>): string {
    // Output is source code, not HTML.
    const compiled = Handlebars.compile(template, { noEscape: true, strict: true });
    return compiled(variables);
  }
}

export const defaultTemplatingEngine = new HandlebarsTemplatingEngine();

/**
 * Produces the text to emit for a catalog entry. Entries that are not
 * templates come back unchanged and never pass through the engine.
 */
export function renderTemplate(
  definition: TemplateDefinition,
  content: string,
  variables: Record<string, string> = {},
  engine: ITemplatingEngine = defaultTemplatingEngine,
): string {
  const supplied = Object.keys(variables);

  if (!definition.isTemplate) {
    if (supplied.length > 0) {
      throw new ValidationError(`Template '${definition.id}' does not take variables.`, [
        { message: 'Variables can only be supplied to templates.', path: ['variables'] },
      ]);
    }
    return content;
  }

  const declared = definition.variables ?? [];
  const declaredNames = new Set(declared.map(v => v.name));

  const unknown = supplied.filter(name => !declaredNames.has(name));
  if (unknown.length > 0) {
    throw new ValidationError(
      `Unknown variables for '${definition.id}': ${unknown.join(', ')}`,
      unknown.map(name => ({ message: 'Variable is not declared.', path: ['variables', name] })),
    );
  }

  // Own keys only; names such as `constructor` must not resolve through the prototype.
  const resolved = new Map<string, string>();
  const missing: string[] = [];
  for (const variable of declared) {
    const value = Object.hasOwn(variables, variable.name) ? variables[variable.name] : variable.default;
    if (value === undefined) {
      missing.push(variable.name);
    } else {
      resolved.set(variable.name, value);
    }
  }
  if (missing.length > 0) {
    throw new ValidationError(
      `Missing variables for '${definition.id}': ${missing.join(', ')}`,
      missing.map(name => ({ message: 'Variable is required.', path: ['variables', name] })),
    );
  }

  return engine.render(content, Object.fromEntries(resolved));
}
