export { BUNDLED_TEMPLATES_DIR, EnvSchema, type EnvVars, loadConfig } from './config.js';
export { type EmitOptions, type EmitResult, emitTemplate } from './emitter.js';
export {
  AppError,
  EmitIoError,
  ErrorCode,
  LockError,
  NotFoundError,
  ValidationError,
} from './errors.js';
export { type Logger, createLogger } from './logger.js';
export {
  HandlebarsTemplatingEngine,
  type ITemplatingEngine,
  defaultTemplatingEngine,
  renderTemplate,
} from './renderer.js';
export { type TemplateDefinition, type TemplateVariable, manifestSchema } from './schemas.js';
export { FileTemplateCatalog, type TemplateCatalog, loadCatalog } from './templates.js';
export { runCli } from './cli.js';
