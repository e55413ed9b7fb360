/**
 * 文字列以外の値が渡されたときに投げるエラー。
 * 呼び出し側の契約違反を示すもので、リカバリ対象ではない。
 */
export class InvalidArgumentTypeError extends TypeError {
  constructor(functionName: string, received: unknown) {
    super(`${functionName} requires a string (received: ${describeValueKind(received)})`);
    this.name = 'InvalidArgumentTypeError';
  }
}

/**
 * エラーメッセージ用に値の種別を返す。
 * typeof だけでは区別できない null / 配列を個別に扱う。
 */
export function describeValueKind(value: unknown): string {
  if (value === null) {
    return 'null';
  }
  if (Array.isArray(value)) {
    return 'array';
  }
  return typeof value;
}

/**
 * 値が文字列であることを検証する。
 * ホスト側のドキュメントモデルから届いた値など、型が保証されない入力の境界で使う。
 */
export function assertString(value: unknown, functionName: string): asserts value is string {
  if (typeof value !== 'string') {
    throw new InvalidArgumentTypeError(functionName, value);
  }
}

/**
 * 1行分のテキストを大文字に変換する。
 *
 * - ロケール非依存（String.prototype.toUpperCase の既定マッピング）
 * - 入力は変更しない。大文字化済みの入力はそのまま返る（冪等）
 */
export function toUppercase(text: unknown): string {
  assertString(text, 'toUppercase');
  return text.toUpperCase();
}
