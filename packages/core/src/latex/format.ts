export const DOCUMENT_PACKAGES = [
  '\\usepackage{amsmath}',
  '\\usepackage{amssymb}',
  '\\usepackage{amsfonts}',
  '\\usepackage{graphicx}',
  '\\usepackage{booktabs}',
  '\\usepackage{tikz}',
] as const;

const MATH_DELIMITERS = ['\\[', '\\]', '$$', '$'];

function wrapIn(environment: string, body: string): string {
  return `\\begin{${environment}}\n${body}\n\\end{${environment}}`;
}

/**
 * Wrap math in `$...$` (inline) or in an `equation`/`align` environment
 * (display). Existing `\[`, `\]`, `$$` and `$` delimiters are removed first.
 */
export function wrapEquation(latexCode: string, inline = false): string {
  let body = latexCode.trim();
  for (const delimiter of MATH_DELIMITERS) {
    body = body.split(delimiter).join('');
  }
  body = body.trim();

  if (inline) {
    return `$${body}$`;
  }

  if (body.includes('\\\\') || body.toLowerCase().includes('align')) {
    return body.startsWith('\\begin{align') ? body : wrapIn('align', body);
  }

  return body.startsWith('\\begin{equation') ? body : wrapIn('equation', body);
}

/**
 * Wrap tabular content in a centered `table` float. Content that is not
 * already a `tabular` gets a single centered column.
 */
export function wrapTable(latexCode: string, caption?: string): string {
  const code = latexCode.trim();

  if (code.startsWith('\\begin{table')) {
    return code;
  }

  let result = '\\begin{table}[htbp]\n\\centering\n';

  if (caption) {
    result += `\\caption{${caption}}\n`;
  }

  if (code.startsWith('\\begin{tabular')) {
    result += `${code}\n`;
  } else {
    result += `\\begin{tabular}{c}\n${code}\n\\end{tabular}\n`;
  }

  return `${result}\\end{table}`;
}

export interface FullDocumentOptions {
  title?: string;
  author?: string;
  documentClass?: string;
}

/** Build a standalone document around `content`. */
export function createFullDocument(content: string, options: FullDocumentOptions = {}): string {
  const { title, author, documentClass = 'article' } = options;
  const lines: string[] = [`\\documentclass{${documentClass}}`, '', ...DOCUMENT_PACKAGES, ''];

  lines.push('\\begin{document}', '');

  if (title) {
    lines.push(`\\title{${title}}`);
    if (author) {
      lines.push(`\\author{${author}}`);
    }
    lines.push('\\maketitle', '');
  }

  lines.push(content, '', '\\end{document}');

  return `${lines.join('\n')}\n`;
}
