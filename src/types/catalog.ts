/**
 * Operation catalog and request types
 */

export type JsonValue =
  | null
  | boolean
  | number
  | string
  | JsonValue[]
  | { [key: string]: JsonValue };

/**
 * One callable endpoint of the OpenAPI document
 */
export interface OperationDefinition {
  /** Stable OpenAPI operation identifier */
  readonly operationId: string;
  /** Uppercase HTTP method (for example `GET`, `POST`) */
  readonly method: string;
  /** Absolute path, possibly containing `{param}` placeholders */
  readonly pathTemplate: string;
  /** Placeholder names of `pathTemplate`, in order of first appearance */
  readonly pathParams: readonly string[];
}

/**
 * Key/value input: ordered pairs, or a plain record when order does not matter.
 * With pairs, the first entry for a key wins.
 */
export type ParamInput = ReadonlyArray<readonly [string, string]> | Readonly<Record<string, string>>;

export interface RequestOptions {
  query?: ParamInput;
  /** JSON body; `undefined` sends no body, `null` sends the JSON literal */
  body?: JsonValue;
}

export interface CallOperationOptions extends RequestOptions {
  pathParams?: ParamInput;
}

export function toPairs(input: ParamInput | undefined): ReadonlyArray<readonly [string, string]> {
  if (!input) return [];
  if (isPairList(input)) return input;
  return Object.entries(input);
}

function isPairList(input: ParamInput): input is ReadonlyArray<readonly [string, string]> {
  return Array.isArray(input);
}
