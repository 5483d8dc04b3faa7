const SKIP_PHRASES = [
  'here is',
  "here's",
  'the latex',
  'this is',
  "i've converted",
  'converted to',
  'latex code:',
  'explanation:',
  'note:',
];

function stripCodeFences(text: string): string {
  return text
    .replace(/```latex\n/g, '')
    .replace(/```tex\n/g, '')
    .replace(/```\n/g, '')
    .replace(/```/g, '');
}

function isLatexStart(line: string): boolean {
  const trimmed = line.trim();
  return trimmed.startsWith('\\') || trimmed.startsWith('$');
}

/**
 * Pull the LaTeX payload out of a free-form model completion.
 *
 * Code fences are removed, then everything before the first line that
 * starts with `\` or `$` is dropped (explanatory preamble). From that line
 * on the text is kept verbatim. When no such line exists the fence-free
 * input is returned trimmed.
 */
export function extractLatexCode(rawText: string): string {
  const text = stripCodeFences(rawText);
  const kept: string[] = [];
  let started = false;

  for (const line of text.split('\n')) {
    if (!started) {
      const lower = line.trim().toLowerCase();
      if (SKIP_PHRASES.some((phrase) => lower.includes(phrase))) continue;
      if (!isLatexStart(line)) continue;
      started = true;
    }
    kept.push(line);
  }

  const result = kept.join('\n').trim();
  return result === '' ? text.trim() : result;
}
