/**
 * Annotation micro-grammar
 *
 * annotation format  $name:$arg1:$arg2:...$argN:$key1=$value1:$key2=$value2:...
 *
 * For example, parsing `foo:a1:a2:k1=v1:k2=v2` for plugin `foo` with two
 * arguments and extension options `{ k3: 'v3' }` gives
 *
 *   args     ['a1', 'a2']
 *   options  { k1: 'v1', k2: 'v2', k3: 'v3' }
 */

import { Options } from './options.js';

export const ANNOTATION_SEPARATOR = ':';
export const ESCAPED_ANNOTATION_SEPARATOR = '\\u003A';
export const KEY_VALUE_SEPARATOR = '=';

export interface ParsedAnnotation {
  args: string[];
  options: Options;
}

/**
 * Replace escaped separators `\:` with a placeholder so they survive splitting
 */
export function escapeAnnotation(str: string): string {
  return str.split('\\:').join(ESCAPED_ANNOTATION_SEPARATOR);
}

export function unescapeAnnotation(str: string): string {
  return str.split(ESCAPED_ANNOTATION_SEPARATOR).join(ANNOTATION_SEPARATOR);
}

/**
 * Split at the first separator: `k=v=3` → ['k', 'v=3'], `k` → ['k', '']
 */
export function splitKV(str: string, separator: string): [string, string] {
  const index = str.indexOf(separator);
  if (index < 0) {
    return [str, ''];
  }
  return [str.slice(0, index), str.slice(index + separator.length)];
}

/**
 * Split key-value items into `into`. Empty items are skipped and values of a
 * repeated key are joined with `,` in encounter order.
 */
export function splitKVList(items: string[], separator: string, into: Map<string, string>): Map<string, string> {
  for (const item of items) {
    if (item.length === 0) continue;

    const [key, value] = splitKV(item, separator);
    const previous = into.get(key);
    into.set(key, previous === undefined ? value : `${previous},${value}`);
  }
  return into;
}

/**
 * Parse an annotation for plugin `name` with `argsCount` positional args.
 * Returns null when the name differs or there are fewer segments than args.
 * Extension options only fill keys the annotation does not set.
 */
export function parseAnnotation(
  annotation: string,
  name: string,
  argsCount: number,
  extOptions: Record<string, string> = {}
): ParsedAnnotation | null {
  const segments = escapeAnnotation(annotation).split(ANNOTATION_SEPARATOR);
  if (segments[0] !== name || segments.length - 1 < argsCount) {
    return null;
  }

  const values = splitKVList(segments.slice(1 + argsCount), KEY_VALUE_SEPARATOR, new Map());
  for (const [key, value] of values) {
    values.set(key, unescapeAnnotation(value));
  }

  for (const [key, value] of Object.entries(extOptions)) {
    if (!values.has(key)) {
      values.set(key, value);
    }
  }

  return {
    args: segments.slice(1, 1 + argsCount),
    options: new Options(values),
  };
}
