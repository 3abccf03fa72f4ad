const HEADER_REPLACEMENTS: ReadonlyArray<[string, string]> = [
  ['### ', '🌡️ '],
  ['## ', '📍 '],
  ['# ', '🌤️ '],
];

const INLINE_REPLACEMENTS: ReadonlyArray<[string, string]> = [
  ['**', ''],
  ['__', ''],
  ['- ', '  • '],
  ['* ', '  • '],
];

/**
 * Strip markdown from model output for plain console display.
 * Order matters: deeper headers first so "### " is not eaten by "# ".
 */
export function cleanMarkdown(text: string): string {
  let cleaned = text;
  for (const [from, to] of [...HEADER_REPLACEMENTS, ...INLINE_REPLACEMENTS]) {
    cleaned = cleaned.split(from).join(to);
  }
  return cleaned.replace(/\n{3,}/g, '\n\n').trim();
}
