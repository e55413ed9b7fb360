/**
 * ホストエディタとの境界。
 *
 * コマンド登録とバッファ入出力はホストが所有する。コア側はこのインターフェース越しにのみ触れるため、
 * テストではインメモリ実装を差し込める。
 */

/**
 * 登録解除などの後始末を表す（vscode.Disposable と互換）。
 */
export interface Disposable {
  dispose(): unknown;
}

/**
 * コマンド名とハンドラの対応表。`vscode.commands` はこの形を満たす。
 */
export interface CommandRegistry {
  registerCommand(command: string, handler: () => unknown): Disposable;
}

/**
 * 編集対象ドキュメントの行バッファ。
 * 行の挿入・削除は行わず、行単位の置換のみを提供する。
 */
export interface LineBuffer {
  getLines(): Promise<readonly string[]>;
  setLine(index: number, text: string): Promise<void>;
}

/**
 * コマンドハンドラが必要とするホスト機能。
 */
export interface EditorHost {
  /** アクティブなエディタが無い場合は undefined */
  getActiveBuffer(): LineBuffer | undefined;
  showWarningMessage(message: string): void;
  showErrorMessage(message: string): void;
}
