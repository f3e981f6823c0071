/**
 * CSV 読み書きの最小ユーティリティ
 *
 * @description ダブルクォート対応の行パースとフィールドのエスケープ
 */

/**
 * CSVテキストを行ごとにパース（ダブルクォート対応、空行は除外）
 */
export function parseCsvLines(csvText: string): string[][] {
  // 先頭の BOM を除去
  const text = csvText.startsWith('\uFEFF') ? csvText.slice(1) : csvText;
  const lines = text.split(/\r?\n/).filter((line) => line.trim().length > 0);

  return lines.map((line) => {
    const cells: string[] = [];
    let current = '';
    let inQuotes = false;

    for (let i = 0; i < line.length; i++) {
      const ch = line[i];
      if (inQuotes) {
        if (ch === '"' && line[i + 1] === '"') {
          current += '"';
          i++;
        } else if (ch === '"') {
          inQuotes = false;
        } else {
          current += ch;
        }
      } else if (ch === '"') {
        inQuotes = true;
      } else if (ch === ',') {
        cells.push(current.trim());
        current = '';
      } else {
        current += ch;
      }
    }
    cells.push(current.trim());
    return cells;
  });
}

/**
 * フィールドをエスケープ（カンマ・引用符・改行を含む場合のみクォート）
 */
export function formatCsvField(value: string | number): string {
  const text = String(value);
  if (/[",\r\n]/.test(text)) {
    return `"${text.replace(/"/g, '""')}"`;
  }
  return text;
}

/**
 * 1行分の CSV を生成
 */
export function formatCsvRow(cells: ReadonlyArray<string | number>): string {
  return cells.map(formatCsvField).join(',');
}
