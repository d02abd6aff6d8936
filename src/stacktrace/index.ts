/**
 * Stack trace module exports
 */

export {
  formatStackTrace,
  parseStackLine,
  splitTraceLines,
  isParsedFrame,
  firstParsedFrame,
  v8NamedFrameParser,
  v8AnonymousFrameParser,
  indexedFrameParser,
  DEFAULT_LINE_PARSERS,
  ANONYMOUS_FUNCTION,
} from './parser.js';
export type { StackLineParser } from './parser.js';
