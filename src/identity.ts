/** Suffix git conventionally puts on bare repository names */
export const VCS_SUFFIX = '.git';

function lastSegment(value: string, separator: string): string {
  const segments = value.split(separator);
  return segments[segments.length - 1] ?? value;
}

function stripSuffix(value: string): string {
  return value.endsWith(VCS_SUFFIX) ? value.slice(0, -VCS_SUFFIX.length) : value;
}

/**
 * Short name of the repository a remote points at.
 *
 * `git@host:org/proj.git` and `https://host/org/proj.git` both give `proj`.
 * An identifier without `/` is returned whole (minus the suffix).
 */
export function repoName(remote: string): string {
  return stripSuffix(lastSegment(remote, '/'));
}

/**
 * Display path of a remote: everything after the last `:`.
 *
 * `git@host:org/proj.git` gives `org/proj`. For URL syntax this is the
 * part after the scheme (or port) separator, e.g. `//host/org/proj`.
 * The result is only meaningful for scp-like remotes; use it for display,
 * never to locate anything.
 */
export function repoPath(remote: string): string {
  return stripSuffix(lastSegment(remote, ':'));
}
