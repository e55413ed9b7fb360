import type * as vscode from 'vscode';
import type { EditorHost, LineBuffer } from './editorHost';

/**
 * ホストが編集を拒否した（editor.edit が false を返した）ときのエラー。
 * ドキュメントが読み取り専用になった、編集中にエディタが閉じられた等で発生する。
 */
export class EditRejectedError extends Error {
  constructor(readonly lineIndex: number) {
    super(`The editor rejected the edit for line ${lineIndex}`);
    this.name = 'EditRejectedError';
  }
}

/**
 * アダプタが使う vscode.window の部分集合。テストではこの形のスタブを渡す。
 */
export type VscodeWindowApi = Pick<typeof vscode.window, 'activeTextEditor' | 'showWarningMessage' | 'showErrorMessage'>;

/**
 * vscode.TextEditor を LineBuffer として扱うアダプタ。
 */
export class TextEditorLineBuffer implements LineBuffer {
  constructor(private readonly editor: vscode.TextEditor) {}

  async getLines(): Promise<readonly string[]> {
    const document = this.editor.document;
    const lines: string[] = [];
    for (let i = 0; i < document.lineCount; i++) {
      lines.push(document.lineAt(i).text);
    }
    return lines;
  }

  /**
   * 行内容のみを置換する（改行コードは lineAt().range に含まれないため維持される）。
   */
  async setLine(index: number, text: string): Promise<void> {
    const document = this.editor.document;
    if (!Number.isInteger(index) || index < 0 || index >= document.lineCount) {
      throw new RangeError(`Line index ${index} is out of range (lineCount: ${document.lineCount})`);
    }
    const range = document.lineAt(index).range;
    const applied = await this.editor.edit((editBuilder) => {
      editBuilder.replace(range, text);
    });
    if (!applied) {
      throw new EditRejectedError(index);
    }
  }
}

/**
 * vscode.window を EditorHost として公開する。
 */
export function createVscodeEditorHost(window: VscodeWindowApi): EditorHost {
  return {
    getActiveBuffer: () => {
      const editor = window.activeTextEditor;
      return editor ? new TextEditorLineBuffer(editor) : undefined;
    },
    showWarningMessage: (message) => {
      void window.showWarningMessage(message);
    },
    showErrorMessage: (message) => {
      void window.showErrorMessage(message);
    },
  };
}
