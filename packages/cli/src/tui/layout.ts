/**
 * Layout sizes shared by the TUI screens.
 */

/** Timer screen header width: the title plus its six key hints */
export const TIMER_WIDTH = 84;

/** Width of the selection marker drawn before each table row */
export const MARKER_WIDTH = 2;

/** Total width a table with these columns takes up. */
export function tableWidth(columns: ReadonlyArray<{ width: number }>): number {
  return columns.reduce((sum, col) => sum + col.width, MARKER_WIDTH);
}
