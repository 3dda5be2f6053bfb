/**
 * Terminal colors for CLI output
 *
 * Honors NO_COLOR and FORCE_COLOR, and stays plain when stdout is not a TTY.
 */

const enabled = (() => {
  if ('NO_COLOR' in process.env) return false;
  if ('FORCE_COLOR' in process.env) return true;
  if (process.env.TERM === 'dumb') return false;
  return process.stdout?.isTTY === true;
})();

export type Paint = (s: string | number) => string;

const code = (open: number, close: number): Paint => {
  if (!enabled) return (s) => String(s);

  const openCode = `\x1b[${open}m`;
  const closeCode = `\x1b[${close}m`;
  const closeRe = new RegExp(`\\x1b\\[${close}m`, 'g');

  // Re-open after nested closes so colors.bold(colors.red(x)) stays bold
  return (s) => openCode + String(s).replace(closeRe, openCode) + closeCode;
};

export const bold = code(1, 22);
export const red = code(31, 39);
export const green = code(32, 39);
export const yellow = code(33, 39);
export const cyan = code(36, 39);
export const gray = code(90, 39);

const colors = { enabled, bold, red, green, yellow, cyan, gray };

export default colors;
