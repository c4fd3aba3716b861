export * from './types.js';
export { GroupRegistry } from './group-registry.js';
export {
  assembleRoute,
  assembleSchema,
  parseArgsToMap,
  parseParameterInfo,
  parseResponseInfo,
  type AssemblyContext,
} from './assembler.js';
