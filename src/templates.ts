import * as fsp from 'fs/promises';
import path from 'path';

import { z } from 'zod';

import { EmitIoError, NotFoundError, ValidationError, errnoOf, messageOf } from './errors.js';
import { type TemplateDefinition, manifestSchema } from './schemas.js';

export const MANIFEST_FILE = 'manifest.json';

export interface TemplateCatalog {
  list(): TemplateDefinition[];
  get(id: string): TemplateDefinition;
  read(id: string): Promise<string>;
}

async function readText(filePath: string): Promise<string> {
  try {
    return await fsp.readFile(filePath, 'utf-8');
  } catch (error: unknown) {
    throw new EmitIoError(`Could not read ${filePath}: ${messageOf(error)}`, filePath, errnoOf(error));
  }
}

/**
 * Catalog backed by a directory holding `manifest.json` and the template files it names.
 */
export class FileTemplateCatalog implements TemplateCatalog {
  private readonly byId: Map<string, TemplateDefinition>;

  public constructor(
    private readonly templatesDir: string,
    definitions: TemplateDefinition[],
  ) {
    this.byId = new Map();
    for (const definition of definitions) {
      if (this.byId.has(definition.id)) {
        throw new ValidationError(`Duplicate template id '${definition.id}' in manifest.`, [
          { message: 'Duplicate template id.', path: ['templates', definition.id] },
        ]);
      }
      this.byId.set(definition.id, definition);
    }
  }

  public list(): TemplateDefinition[] {
    return Array.from(this.byId.values());
  }

  public get(id: string): TemplateDefinition {
    const definition = this.byId.get(id);
    if (!definition) {
      throw new NotFoundError(`Template '${id}' not found`);
    }
    return definition;
  }

  /** Returns the template text exactly as stored. */
  public async read(id: string): Promise<string> {
    const definition = this.get(id);
    return readText(path.resolve(this.templatesDir, definition.file));
  }
}

export async function loadCatalog(templatesDir: string): Promise<FileTemplateCatalog> {
  const manifestPath = path.join(templatesDir, MANIFEST_FILE);
  const raw = await readText(manifestPath);

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error: unknown) {
    throw new ValidationError(`Invalid manifest ${manifestPath}: ${messageOf(error)}`);
  }

  try {
    const manifest = manifestSchema.parse(json);
    return new FileTemplateCatalog(templatesDir, manifest.templates);
  } catch (error: unknown) {
    if (error instanceof z.ZodError) {
      const details = error.issues.map(i => ({ message: i.message, path: i.path }));
      const lines = details.map(d => `- ${d.path.join('.')}: ${d.message}`);
      throw new ValidationError(`Invalid manifest ${manifestPath}:\n` + lines.join('\n'), details);
    }
    throw error;
  }
}
