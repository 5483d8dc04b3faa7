export interface LatexValidation {
  isValid: boolean;
  error?: string;
}

function countOf(text: string, char: string): number {
  let count = 0;
  for (const c of text) {
    if (c === char) count++;
  }
  return count;
}

function environmentNames(text: string, keyword: 'begin' | 'end'): string[] {
  const pattern = new RegExp(`\\\\${keyword}\\{(\\w+)\\}`, 'g');
  return Array.from(text.matchAll(pattern), (match) => match[1] ?? '');
}

/**
 * Structural sanity check: balanced braces, brackets and environments.
 *
 * Environments are compared by count, not by nesting, so
 * `\begin{a}\begin{b}\end{a}\end{b}` passes.
 */
export function validateLatex(latexCode: string): LatexValidation {
  if (countOf(latexCode, '{') !== countOf(latexCode, '}')) {
    return { isValid: false, error: 'Unbalanced braces: {} count mismatch' };
  }

  if (countOf(latexCode, '[') !== countOf(latexCode, ']')) {
    return { isValid: false, error: 'Unbalanced brackets: [] count mismatch' };
  }

  const begins = environmentNames(latexCode, 'begin');
  const ends = environmentNames(latexCode, 'end');

  if (begins.length !== ends.length) {
    return {
      isValid: false,
      error: 'Unbalanced environments: \\begin{} and \\end{} count mismatch',
    };
  }

  const closed = new Set(ends);
  const unclosed = begins.find((name) => !closed.has(name));
  if (unclosed !== undefined) {
    return { isValid: false, error: `Environment '${unclosed}' opened but not closed` };
  }

  return { isValid: true };
}
