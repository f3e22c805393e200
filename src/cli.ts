import path from 'path';

import { type EnvVars, loadConfig } from './config.js';
import { emitTemplate } from './emitter.js';
import { AppError, ValidationError, messageOf } from './errors.js';
import { type Logger, createLogger } from './logger.js';
import { renderTemplate } from './renderer.js';
import { type TemplateCatalog, loadCatalog } from './templates.js';

export interface CliIo {
  stdout: (text: string) => void;
  /** Writes to stdout without adding a newline. */
  write: (text: string) => void;
  stderr: (text: string) => void;
  cwd: string;
}

export interface CliDeps {
  env?: NodeJS.ProcessEnv;
  io?: Partial<CliIo>;
  logger?: Logger;
  catalog?: TemplateCatalog;
}

interface EmitArgs {
  id: string;
  target?: string;
  outDir?: string;
  variables: Record<string, string>;
  lock: boolean;
}

export const USAGE = [
  'Usage: template-emitter <command>',
  '',
  'Commands:',
  '  list                              List bundled templates',
  '  show <id>                         Print a template',
  '  emit <id> [target] [options]      Write a template to disk',
  '',
  'Emit options:',
  '  --out-dir <dir>                   Resolve the target against <dir>',
  '  --var.<name>=<value>              Set a template variable',
  '  --lock                            Lock the target while writing',
].join('\n');

export function parseEmitArgs(args: string[], env: Pick<EnvVars, 'EMIT_LOCK'>): EmitArgs {
  const positional: string[] = [];
  const variables = new Map<string, string>();
  let outDir: string | undefined;
  let lock = env.EMIT_LOCK;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === '--lock') {
      lock = true;
    } else if (arg === '--out-dir') {
      outDir = args[++i];
      if (outDir === undefined) {
        throw new ValidationError('--out-dir requires a directory');
      }
    } else if (arg.startsWith('--var.')) {
      const eq = arg.indexOf('=');
      const key = eq === -1 ? '' : arg.slice('--var.'.length, eq);
      if (!key) {
        throw new ValidationError(`Malformed variable '${arg}', expected --var.<name>=<value>`);
      }
      variables.set(key, arg.slice(eq + 1));
    } else if (arg.startsWith('--')) {
      throw new ValidationError(`Unknown option '${arg}'`);
    } else {
      positional.push(arg);
    }
  }

  const [id, target, ...extra] = positional;
  if (!id) {
    throw new ValidationError('emit requires a template id');
  }
  if (extra.length > 0) {
    throw new ValidationError(`Unexpected arguments: ${extra.join(' ')}`);
  }
  return { id, lock, outDir, target, variables: Object.fromEntries(variables) };
}

/**
 * Runs one CLI command and returns the process exit code.
 */
export async function runCli(argv: string[], deps: CliDeps = {}): Promise<number> {
  const io: CliIo = {
    cwd: deps.io?.cwd ?? process.cwd(),
    stderr: deps.io?.stderr ?? (text => process.stderr.write(text + '\n')),
    stdout: deps.io?.stdout ?? (text => process.stdout.write(text + '\n')),
    write: deps.io?.write ?? (text => process.stdout.write(text)),
  };

  try {
    const [command, ...rest] = argv;

    if (command === undefined || command === 'help' || command === '--help') {
      io.stdout(USAGE);
      return 0;
    }

    const env = loadConfig(deps.env ?? process.env);

    const logger = deps.logger ?? createLogger(env);
    const catalog = deps.catalog ?? (await loadCatalog(env.TEMPLATES_DIR));
    logger.debug({ command }, 'Running command');

    switch (command) {
      case 'list':
        for (const t of catalog.list()) {
          io.stdout(`${t.id}\t${t.defaultTarget}\t${t.name}`);
        }
        return 0;

      case 'show': {
        if (!rest[0]) {
          throw new ValidationError('show requires a template id');
        }
        io.write(await catalog.read(rest[0]));
        return 0;
      }

      case 'emit': {
        const args = parseEmitArgs(rest, env);
        const definition = catalog.get(args.id);
        const content = renderTemplate(definition, await catalog.read(args.id), args.variables);
        const baseDir = path.resolve(io.cwd, args.outDir ?? '.');
        const targetPath = path.resolve(baseDir, args.target ?? definition.defaultTarget);

        logger.info({ template: definition.id, target: targetPath }, 'Emitting template');
        const result = emitTemplate(content, targetPath, { lock: args.lock, logger });
        io.stdout(`Wrote ${result.bytes} bytes to ${result.path}`);
        return 0;
      }

      default:
        throw new ValidationError(`Unknown command '${command}'\n\n${USAGE}`);
    }
  } catch (error: unknown) {
    if (error instanceof AppError) {
      io.stderr(`Error: ${error.message}`);
      return error.exitCode;
    }
    io.stderr(`Error: ${messageOf(error)}`);
    return 1;
  }
}
