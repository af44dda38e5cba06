/**
 * annokit - annotation-driven code generation for TypeScript sources
 *
 * Comment annotations such as `// +ak:plugin:arg:key=value` on top-level
 * declarations are extracted, bound to plugins and handed to them together
 * with a cross-module resolver and a source patch engine.
 */

// Errors
export * from './errors.js';

// Caches
export { Mutex } from './cache/mutex.js';
export { VersionStore } from './cache/version-store.js';
export { CacheStore, KeyedStore, CACHE_NAMES, DEFAULT_CACHE_FILE, type CacheName } from './cache/cache-store.js';

// Source model
export { SourceLoader, readSource, type LoadedFile } from './source/loader.js';
export { SourceUnit, type TopLevelBinding } from './source/source-unit.js';
export {
  ImportList,
  placeImports,
  renderImport,
  type ImportEntry,
  type ImportBinding,
  type ImportKind,
  type ImportPlacement,
} from './source/imports.js';
export { splitComments, nodeComments, leadingComment, trailingComment, commentText } from './source/comments.js';
export { findSyntaxErrors, fingerprint, parseSourceFile, type SyntaxProblem } from './source/syntax.js';
export { importNameOf, isSourceFile, stripSourceExtension, toIdentifier } from './source/naming.js';

// Annotations
export {
  parseAnnotation,
  escapeAnnotation,
  unescapeAnnotation,
  splitKV,
  splitKVList,
  ANNOTATION_SEPARATOR,
  KEY_VALUE_SEPARATOR,
  type ParsedAnnotation,
} from './annotations/grammar.js';
export { Options } from './annotations/options.js';
export {
  bindDecls,
  bindDecl,
  bindField,
  bindFields,
  groupBy,
  groupByDir,
  type DeclEntity,
  type FieldEntity,
  type BindTarget,
} from './annotations/entity.js';

// Extractor
export {
  DeclarationExtractor,
  AnnotatedDecl,
  AnnotatedField,
  extractDecls,
  extractFieldNames,
  classifyType,
  DEFAULT_PREFIX,
  DEFAULT_SKIP_DIRS,
  type DeclKind,
  type DeclTarget,
  type ExtractorOptions,
} from './extractor/index.js';

// Resolver
export { ModuleResolver, isBuiltinModule, extractPackageName, type ModuleResolverOptions } from './resolver/module-resolver.js';
export { lookupType, lookupInUnit, type ResolvedType, type ConcreteBinding } from './resolver/type-lookup.js';
export { fixQualifiedName, type QualifySource, type QualifyTarget } from './resolver/qualify.js';

// Patch engine
export { ModifySet, FileEdit, FORMAT_SETTINGS, type Replacement } from './patch/modify-set.js';

// Plugins
export * from './plugins/index.js';

// Config
export {
  configSchema,
  loadConfig,
  getDefaultConfig,
  findConfig,
  loadConfigOrDefault,
  type Config,
  type ResolvedConfig,
} from './config/index.js';

// Watch
export { Watcher, type WatcherEvents, type WatcherOptions } from './watch/watcher.js';
