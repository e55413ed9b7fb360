import type { LineBuffer } from '../host/editorHost';
import { assertString, toUppercase } from './textCase';

export interface BufferTransformResult {
  /** 読み取った行数（変換の前後で変わらない） */
  lineCount: number;
  /** 変換によって内容が変わった行数 */
  changedLineCount: number;
}

/**
 * バッファの全行に transform を適用し、同じ位置へ書き戻す。
 *
 * - 行は 0 から昇順に処理し、1行につき1回 setLine を呼ぶ（内容が変わらない行も書き戻す）
 * - 書き込みは1件ずつ await してから次へ進む
 * - transform / setLine が失敗した時点で中断し、エラーをそのまま伝播する（それ以前の行は書き込み済み）
 */
export async function transformBufferLines(
  buffer: LineBuffer,
  transform: (line: string) => string,
): Promise<BufferTransformResult> {
  const lines = await buffer.getLines();
  let changedLineCount = 0;

  for (let i = 0; i < lines.length; i++) {
    const line: unknown = lines[i];
    assertString(line, 'transformBufferLines');
    const converted = transform(line);
    if (converted !== line) {
      changedLineCount++;
    }
    await buffer.setLine(i, converted);
  }

  return { lineCount: lines.length, changedLineCount };
}

/**
 * バッファの全行を大文字に変換する。
 */
export function bufferToUppercase(buffer: LineBuffer): Promise<BufferTransformResult> {
  return transformBufferLines(buffer, toUppercase);
}
