export type PathLike = string | readonly string[];

/**
 * Split a slash separated path into its segments, dropping empty and `.` parts
 */
export function toSegments(path: PathLike): string[] {
  const parts = typeof path === 'string' ? path.split('/') : path;
  return parts.filter((part) => part !== '' && part !== '.');
}

export function joinPath(segments: readonly string[]): string {
  return segments.join('/');
}
