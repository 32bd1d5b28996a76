/**
 * Elastic tab stops for table output.
 *
 * Every tab-terminated cell is padded to the width of the widest cell in
 * its column plus `padding`, never narrower than `minWidth`. The text
 * after the last tab of a line is written as is.
 */

export interface TabWriterOptions {
  minWidth: number;
  padding: number;
}

export const TABLE_LAYOUT: TabWriterOptions = { minWidth: 10, padding: 3 };

function displayWidth(cell: string): number {
  return Array.from(cell).length;
}

export function alignColumns(text: string, options: TabWriterOptions = TABLE_LAYOUT): string {
  const lines = text.split('\n').map((line) => line.split('\t'));

  const widths: number[] = [];
  for (const cells of lines) {
    cells.slice(0, -1).forEach((cell, column) => {
      const width = Math.max(options.minWidth, displayWidth(cell) + options.padding);
      widths[column] = Math.max(widths[column] ?? 0, width);
    });
  }

  return lines
    .map((cells) =>
      cells
        .map((cell, column) =>
          column < cells.length - 1 ? cell + ' '.repeat(widths[column] - displayWidth(cell)) : cell
        )
        .join('')
    )
    .join('\n');
}
