/**
 * Stack trace text parsing
 *
 * @module stacktrace/parser
 */

import type { ParsedStackFrame, StackFrame, StackTrace } from '../types/index.js';

/**
 * A line parser returns a structured frame, or undefined when the line
 * does not have its shape
 */
export type StackLineParser = (line: string) => ParsedStackFrame | undefined;

// at functionName (/path/to/file.js:10:15)
const V8_NAMED_FRAME = /^\s*at\s+(?:async\s+)?(.+?)\s+\((.+):(\d+):(\d+)\)\s*$/;

// at /path/to/file.js:10:15
const V8_ANONYMOUS_FRAME = /^\s*at\s+(?:async\s+)?(.+):(\d+):(\d+)\s*$/;

// #0 /path/to/file(123): SomeClass->someMethod()
const INDEXED_FRAME = /#\d+\s+([^()]+)\((\d+)\):\s+(\S+)/;

export const ANONYMOUS_FUNCTION = '<anonymous>';

/**
 * V8 call-site with a function name
 */
export const v8NamedFrameParser: StackLineParser = (line) => {
  const match = V8_NAMED_FRAME.exec(line);
  if (!match) {
    return undefined;
  }
  return {
    file: match[2],
    line: parseInt(match[3], 10),
    column: parseInt(match[4], 10),
    function: match[1],
  };
};

/**
 * V8 call-site without a function name
 */
export const v8AnonymousFrameParser: StackLineParser = (line) => {
  const match = V8_ANONYMOUS_FRAME.exec(line);
  if (!match) {
    return undefined;
  }
  return {
    file: match[1],
    line: parseInt(match[2], 10),
    column: parseInt(match[3], 10),
    function: ANONYMOUS_FUNCTION,
  };
};

/**
 * Indexed frame as printed by runtimes that report no column
 */
export const indexedFrameParser: StackLineParser = (line) => {
  const match = INDEXED_FRAME.exec(line);
  if (!match) {
    return undefined;
  }
  return {
    file: match[1].trim(),
    line: parseInt(match[2], 10),
    column: 0,
    function: match[3],
  };
};

export const DEFAULT_LINE_PARSERS: readonly StackLineParser[] = [
  v8NamedFrameParser,
  v8AnonymousFrameParser,
  indexedFrameParser,
];

/**
 * Split trace text into lines, accepting \r\n, \n and \r endings
 */
export function splitTraceLines(rawTrace: string): string[] {
  return rawTrace.split(/\r\n|\n|\r/);
}

/**
 * Parse a single trace line, falling back to a raw frame
 */
export function parseStackLine(
  line: string,
  parsers: readonly StackLineParser[] = DEFAULT_LINE_PARSERS
): StackFrame {
  for (const parser of parsers) {
    const frame = parser(line);
    if (frame) {
      return frame;
    }
  }
  return { raw: line };
}

/**
 * Format raw trace text as frames keyed frame0, frame1, ...
 *
 * Every line occupies an index, blank lines and the error's own header
 * line included, so the frame count always equals the line count.
 */
export function formatStackTrace(
  rawTrace: string,
  parsers: readonly StackLineParser[] = DEFAULT_LINE_PARSERS
): StackTrace {
  const frames: StackTrace = {};

  splitTraceLines(rawTrace).forEach((line, index) => {
    frames[`frame${index}`] = parseStackLine(line, parsers);
  });

  return frames;
}

/**
 * Type guard for structured frames
 */
export function isParsedFrame(frame: StackFrame): frame is ParsedStackFrame {
  return 'file' in frame;
}

/**
 * First structured frame of a trace, if any
 */
export function firstParsedFrame(trace: StackTrace): ParsedStackFrame | undefined {
  return Object.values(trace).find(isParsedFrame);
}
