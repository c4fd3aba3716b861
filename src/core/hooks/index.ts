export { HookPipeline, type PostParseHook, type PreGenerationHook } from './pipeline.js';
export {
  RUNTIME_ALIAS,
  createRouteLoggingHook,
  createImportResolutionHook,
  createDefaultHookPipeline,
  relativeSpecifier,
  toRuntimeExtension,
  aliasFor,
  type ImportResolutionOptions,
  type DefaultHookOptions,
} from './builtins.js';
