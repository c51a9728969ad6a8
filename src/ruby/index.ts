/**
 * Ruby parsing module exports
 */

export { RubySourceParser } from './RubySourceParser.js';
export {
  childrenOf,
  namedChildrenOf,
  lineOf,
  constantName,
  isRootScoped,
  positionalArguments,
  methodName,
  receiverOf,
  isInterpolatedString,
  stringSegments,
  heredocBodyOf,
  interpolationsOf,
  stringLiteralValue,
  symbolLiteralValue,
  literalFragments,
} from './node-utils.js';
export type { ParseFailure, ParseResult, VisitOutcome } from './types.js';
