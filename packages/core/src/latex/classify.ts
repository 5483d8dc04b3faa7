import type { ContentType } from '../types';

// Evaluated top to bottom; the first rule with a matching marker wins.
const RULES: ReadonlyArray<readonly [Exclude<ContentType, 'unknown'>, readonly string[]]> = [
  ['document', ['\\documentclass', '\\maketitle']],
  ['table', ['\\begin{table', '\\begin{tabular']],
  ['diagram', ['\\begin{tikz', '\\begin{figure', '\\includegraphics']],
  [
    'equation',
    ['\\begin{equation', '\\begin{align', '\\[', '$', '\\frac', '\\int', '\\sum', '\\alpha'],
  ],
];

/** Guess the content type of a LaTeX fragment from its markers. */
export function detectContentType(latexCode: string): ContentType {
  const lower = latexCode.toLowerCase();

  for (const [type, markers] of RULES) {
    if (markers.some((marker) => lower.includes(marker))) {
      return type;
    }
  }

  return 'unknown';
}
