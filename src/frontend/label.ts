/** Characters llvm-mca does not accept in a label. */
const LABEL_UNSAFE = /[()*[\]/ .]/g;

/**
 * Turn a symbol descriptor from a `TEXT` header into a label llvm-mca can parse.
 *
 * Distinct symbols may collide after mangling; labels are only printed, never resolved.
 */
export function mangleLabel(symbol: string): string {
  return `${symbol.replace(LABEL_UNSAFE, '_')}:`;
}
