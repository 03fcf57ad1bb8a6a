/**
 * Prefix a resolved command with one `. <path>/<import>` per import script,
 * so the command sees whatever the imports define.
 */
export function buildCommand(resolved: string, imports: readonly string[], path: string): string {
  if (imports.length === 0) {
    return resolved;
  }
  const sources = imports.map(name => `. ${path}/${name}`);
  return [...sources, resolved].join('; ');
}
