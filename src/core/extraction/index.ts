export { extractMarkers, producesRecord, checkArity, type ExtractionResult } from './extractor.js';
export { checkMarkerSyntax, parenthesesBalanced, type SyntaxViolation } from './syntax.js';
export {
  tokenizeLine,
  findClosingParen,
  splitArguments,
  stripQuotes,
  type MarkerToken,
  type SplitResult,
} from './tokenizer.js';
