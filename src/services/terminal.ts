import type { TerminalGeometry } from '../types.js';

type TtyLike = { isTTY?: boolean; columns?: number };

export function stdoutGeometry(stream: TtyLike = process.stdout): TerminalGeometry {
  return {
    columns() {
      if (!stream.isTTY) return undefined;
      const cols = stream.columns;
      return typeof cols === 'number' && Number.isInteger(cols) && cols > 0 ? cols : undefined;
    },
  };
}
