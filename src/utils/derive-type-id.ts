/**
 * Converts a PascalCase class name to a snake_case process type id.
 * E.g., "OrderProcess" -> "order_process", "HTTPFetch" -> "h_t_t_p_fetch"
 */
export function deriveTypeId(className: string): string {
  return className
    .replace(/([A-Z])/g, '_$1')
    .toLowerCase()
    .replace(/^_/, '');
}
