// ============================================
// Host Input Parsing
// ============================================

export type InputCommand =
  | { type: 'click'; x: number; y: number }
  | { type: 'quit' }
  | { type: 'empty' }
  | { type: 'invalid'; line: string };

/**
 * Parse one stdin line.
 * Clicks are "x y" or "click x y" with finite numbers; "quit" stops the game.
 */
export function parseInputLine(line: string): InputCommand {
  const trimmed = line.trim();
  if (trimmed === '') return { type: 'empty' };
  if (trimmed === 'quit') return { type: 'quit' };

  const parts = trimmed.split(/\s+/);
  if (parts[0] === 'click') parts.shift();
  if (parts.length !== 2) return { type: 'invalid', line };

  const x = Number(parts[0]);
  const y = Number(parts[1]);
  if (!Number.isFinite(x) || !Number.isFinite(y)) return { type: 'invalid', line };
  return { type: 'click', x, y };
}
