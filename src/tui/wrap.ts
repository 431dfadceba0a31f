/**
 * Word wrap helpers for transcript text. Widths count code points, matching
 * the one-code-point-per-cell grid.
 */

function width(text: string): number {
  return Array.from(text).length;
}

function breakWord(word: string, maxWidth: number): { full: string[]; rest: string } {
  const cs = Array.from(word);
  const full: string[] = [];
  while (cs.length > maxWidth) {
    full.push(cs.splice(0, maxWidth).join(''));
  }
  return { full, rest: cs.join('') };
}

/**
 * Word wrap one paragraph to fit within a maximum width.
 * Breaks on word boundaries when possible, force-breaks longer words.
 */
export function wrapParagraph(text: string, maxWidth: number): string[] {
  if (maxWidth <= 0) {
    return [text];
  }

  const lines: string[] = [];
  let currentLine = '';

  for (const word of text.split(/\s+/)) {
    if (!word) continue;

    if (currentLine !== '' && width(currentLine) + 1 + width(word) <= maxWidth) {
      currentLine += ' ' + word;
      continue;
    }

    if (currentLine !== '') {
      lines.push(currentLine);
    }
    const { full, rest } = breakWord(word, maxWidth);
    lines.push(...full);
    currentLine = rest;
  }

  if (currentLine !== '' || lines.length === 0) {
    lines.push(currentLine);
  }
  return lines;
}

/**
 * Wrap multi-line text; explicit newlines start new paragraphs and blank
 * lines are kept.
 */
export function wrapText(text: string, maxWidth: number): string[] {
  return text.split('\n').flatMap((paragraph) => wrapParagraph(paragraph, maxWidth));
}
