export { PathRegistry, AliasNameSchema } from './application/PathRegistry.js';
export type { PathFunction, PathSource, RegistryOptions } from './application/PathRegistry.js';
export { createPathRegistry } from './application/RegistryFactory.js';
export type { CreateRegistryOptions } from './application/RegistryFactory.js';

export type { Binding, BindingKind, PathValue, ResolveArgs } from './domain/entities/Binding.js';
export { FilePath } from './domain/value-objects/FilePath.js';
export { FormatSpec } from './domain/value-objects/FormatSpec.js';
export type { TemplateValue } from './domain/value-objects/FormatSpec.js';
export { TemplateString } from './domain/value-objects/TemplateString.js';
export type { TemplateSegment } from './domain/value-objects/TemplateString.js';
export {
  PathbookError,
  UnknownAliasError,
  InvalidAliasError,
  UndefinedPlaceholderError,
  MissingArgumentsError,
  CyclicReferenceError,
  TemplateFormatError,
  CallableInvocationError,
} from './domain/errors/DomainErrors.js';
export type { ErrorClassification } from './domain/errors/DomainErrors.js';

export { loadConfig } from './config/ConfigLoader.js';
export type { PathbookConfig, PartialConfig, Env } from './config/ConfigLoader.js';
export { DEFAULT_CONFIG } from './config/defaults.js';
export { Logger } from './shared/Logger.js';
export type { LogLevel, LogWriter } from './shared/Logger.js';
