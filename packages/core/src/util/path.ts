/**
 * Form paths: dotted property names with bracketed collection indices,
 * e.g. `songs[2].title`. The root node has the empty path.
 */

export function joinPath(base: string, name: string): string {
  if (base === '') return name;
  if (name === '') return base;
  return name.startsWith('[') ? `${base}${name}` : `${base}.${name}`;
}

export function indexPath(base: string, index: number): string {
  return `${base}[${index}]`;
}

export function displayPath(path: string): string {
  return path === '' ? '<root>' : path;
}

/**
 * Convert a JSON Pointer (as reported by ajv's instancePath) to a form path
 */
export function pointerToPath(pointer: string): string {
  if (pointer === '' || pointer === '/') return '';
  return pointer
    .split('/')
    .slice(1)
    .map((segment) => segment.replace(/~1/g, '/').replace(/~0/g, '~'))
    .reduce(
      (path, segment) =>
        /^\d+$/.test(segment)
          ? indexPath(path, Number(segment))
          : joinPath(path, segment),
      ''
    );
}
