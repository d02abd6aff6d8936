/**
 * Common types used throughout the AllStack client.
 *
 * Defines the loosely-typed key/value model used for headers, query
 * parameters and request bodies.
 */

/**
 * Scalar value found in untyped request data
 */
export type DataScalar = string | number | boolean | null;

/**
 * Recursive value model for untyped request data
 */
export type DataValue = DataScalar | DataValue[] | DataMap;

/**
 * Mapping of string keys to data values
 */
export interface DataMap {
  [key: string]: DataValue;
}

/**
 * Raw header bag as exposed by Node's HTTP server (multi-value headers are arrays)
 */
export type HeaderBag = Record<string, string | string[] | undefined>;

/**
 * Raw query parameter bag (repeated parameters are arrays)
 */
export type QueryBag = Record<string, string | string[] | undefined>;
