export interface WordBox {
  width: number;
  height: number;
}

export interface PlacedWord {
  word: string;
  index: number;
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface WordLayout {
  words: PlacedWord[];
  height: number;
  lineCount: number;
}

export interface WordLayoutOptions {
  padding?: number;
}

export function layoutWords(
  words: readonly string[],
  measure: (word: string) => WordBox,
  maxWidth: number,
  options: WordLayoutOptions = {}
): WordLayout {
  const padding = options.padding ?? 4;
  const placed: PlacedWord[] = [];
  let x = 0;
  let y = 0;
  let lineHeight = 0;
  let lineCount = words.length > 0 ? 1 : 0;

  words.forEach((word, index) => {
    const box = measure(word);
    const width = box.width + padding * 2;
    const height = box.height + padding * 2;
    // A word wider than the whole line still starts a fresh line, then sits alone on it.
    if (x > 0 && x + width > maxWidth) {
      x = 0;
      y += lineHeight;
      lineHeight = 0;
      lineCount += 1;
    }
    placed.push({ word, index, x, y, width, height });
    x += width;
    lineHeight = Math.max(lineHeight, height);
  });

  return { words: placed, height: y + lineHeight, lineCount };
}
