export {
  parseDirectory,
  generateRoutes,
  type ParseOptions,
  type ParseStats,
  type ParseResult,
  type GenerateRoutesOptions,
  type GenerationResult,
} from './pipeline.js';
