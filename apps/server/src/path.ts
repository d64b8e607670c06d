/**
 * Splitting a request path into expression and output extension.
 */

/**
 * Extension used when a path has none.
 */
export const DEFAULT_EXTENSION = 'svg';

/**
 * Splits a path on its last dot.
 * Returns null when there is no dot, or when the only dot starts the path (a dotfile).
 *
 * @example
 * splitOnExtension('file.name.ext') // ['file.name', 'ext']
 * splitOnExtension('.dotfile')      // null
 */
export function splitOnExtension(path: string): [string, string] | null {
  const dot = path.lastIndexOf('.');
  if (dot <= 0) {
    return null;
  }
  return [path.slice(0, dot), path.slice(dot + 1)];
}

/**
 * Splits a path into expression and extension, defaulting the extension to svg.
 */
export function parsePath(path: string): [string, string] {
  return splitOnExtension(path) ?? [path, DEFAULT_EXTENSION];
}
