/**
 * stratum - layered parameters and streaming row output for command-line tools.
 */

// Types
export * from './types/index.js';

// Errors and logging
export * from './core/errors.js';
export { getLogger, initLogger, closeLogger } from './core/logger.js';
export { DEFAULT_LOGGING, getConfigFileLocations } from './core/config.js';

// Parameters
export {
  ParameterTypeRegistry,
  createTypeRegistry,
  splitList,
  type ParameterTypeHandler,
  type ParseResult,
  type TypeHandlers,
} from './core/parameters/registry.js';
export { defineParameter } from './core/parameters/definition.js';
export { ParameterLayer, createLayer, assertDistinctLayers } from './core/parameters/layer.js';
export { createLayerBinding, projectLayer, type LayerBinding } from './core/parameters/binding.js';

// Sources
export * from './core/sources/providers.js';
export { configFileSource, loadConfigDocument, type ConfigFileInput } from './core/sources/config-file.js';
export {
  SourceChain,
  createSourceChain,
  providerMiddleware,
  traceContributions,
  type SourceMiddleware,
} from './core/sources/chain.js';
export { ContributionStore, type SourceContext, type SourceWriter } from './core/sources/store.js';
export type { Middleware, Next } from './core/sources/compose.js';

// Resolution
export { resolveParameters, resolveLayers, resolveLayer } from './core/resolution/engine.js';
export {
  ParsedLayer,
  ParsedLayers,
  type Contribution,
  type ResolvedParameter,
} from './core/resolution/parsed-layers.js';
export { describeParsedLayers, SECRET_MASK, type ParameterDescription } from './core/resolution/describe.js';

// Rows
export * from './core/rows/value.js';
export { Row, type RowField, type RowInput } from './core/rows/row.js';
export { compileFilter, checkFilterSyntax, type RowPredicate } from './core/rows/filter-expression.js';
export * from './core/rows/stages.js';
export * from './core/rows/destination.js';
export * from './core/rows/sinks/index.js';
export {
  RowPipeline,
  createRowPipeline,
  type PipelineState,
  type RowEmitter,
  type RowPipelineOptions,
} from './core/rows/pipeline.js';

// Built-in layers
export * from './core/layers/output.js';
export * from './core/layers/logging.js';
export * from './core/layers/command-settings.js';

// Commands
export * from './core/commands/index.js';
