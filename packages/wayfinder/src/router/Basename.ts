/**
 * Basename prefixing and stripping.
 *
 * `basename` is expected in normalized form (see `normalizeBasename`).
 */

/**
 * Prefix a route with the basename. An empty route always becomes "/".
 */
export function prefixBasename(basename: string, path: string): string {
  if (path === "") {
    return "/";
  }
  return basename === "" ? path : `${basename}${path}`;
}

/**
 * Strip a leading basename from a path.
 *
 * When what remains does not start with "/" (the path was the bare basename,
 * or only shared a prefix with it) the result is "/" followed by the
 * basename, e.g. "//app" for basename "/app".
 */
export function stripBasename(basename: string, path: string): string {
  if (basename === "") {
    return path;
  }
  const stripped = path.startsWith(basename) ? path.slice(basename.length) : path;
  return stripped.startsWith("/") ? stripped : `/${basename}`;
}
