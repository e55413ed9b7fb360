import * as assert from 'assert';
import type * as vscode from 'vscode';
import { bufferToUppercase } from '../../../core/bufferTransform';
import {
  EditRejectedError,
  TextEditorLineBuffer,
  createVscodeEditorHost,
  type VscodeWindowApi,
} from '../../../host/vscodeEditorHost';

interface FakeRange {
  line: number;
}

/**
 * テスト用の簡易 TextEditor。lineAt().range は行番号だけを持つ。
 * edit のたびに replaces へ記録し、lines を更新する。
 */
function createFakeEditor(lines: string[], options: { rejectEdits?: boolean } = {}) {
  const replaces: Array<{ line: number; text: string }> = [];
  let editCalls = 0;
  const document = {
    get lineCount() {
      return lines.length;
    },
    lineAt: (line: number) => ({ text: lines[line], range: { line } }),
  };
  const editor = {
    document,
    edit: async (callback: (builder: { replace(range: FakeRange, text: string): void }) => void) => {
      editCalls++;
      if (options.rejectEdits) {
        return false;
      }
      callback({
        replace: (range, text) => {
          replaces.push({ line: range.line, text });
          lines[range.line] = text;
        },
      });
      return true;
    },
  } as unknown as vscode.TextEditor;
  return { editor, replaces, lines, getEditCalls: () => editCalls };
}

function createFakeWindow(editor: vscode.TextEditor | undefined) {
  const warnings: string[] = [];
  const errors: string[] = [];
  const window = {
    activeTextEditor: editor,
    showWarningMessage: async (message: string) => {
      warnings.push(message);
      return undefined;
    },
    showErrorMessage: async (message: string) => {
      errors.push(message);
      return undefined;
    },
  } as unknown as VscodeWindowApi;
  return { window, warnings, errors };
}

suite('host/vscodeEditorHost', () => {
  // === 観点表 ===
  // | Case ID | Input / Precondition | Perspective (Equivalence / Boundary) | Expected Result | Notes |
  // |---------|---------------------|--------------------------------------|-----------------|-------|
  // | TC-N-01 | 3行のドキュメント | 正常系 - 読み取り | lineAt().text の配列 | - |
  // | TC-N-02 | setLine(1, 'X') | 正常系 - 書き込み | 行1の range を1回の edit で置換 | - |
  // | TC-N-03 | bufferToUppercase | 正常系 - 結合 | 1行につき1回の edit | - |
  // | TC-E-01 | edit が false | 異常系 | EditRejectedError | - |
  // | TC-E-02 | 範囲外 index | 異常系 | RangeError、edit は呼ばれない | - |
  // | TC-N-04 | activeTextEditor なし | 正常系 | getActiveBuffer は undefined | - |
  // | TC-N-05 | メッセージ表示 | 正常系 | window の showWarningMessage / showErrorMessage へ委譲 | - |

  test('TC-N-01: getLines returns the text of every line', async () => {
    const { editor } = createFakeEditor(['a', 'b', 'c']);
    const buffer = new TextEditorLineBuffer(editor);

    assert.deepStrictEqual(await buffer.getLines(), ['a', 'b', 'c']);
  });

  test('TC-N-02: setLine replaces the range of the line in a single edit', async () => {
    // Given: A three-line document
    const fake = createFakeEditor(['a', 'b', 'c']);
    const buffer = new TextEditorLineBuffer(fake.editor);

    // When: Line 1 is replaced
    await buffer.setLine(1, 'X');

    // Then: Only line 1 changed, with one edit
    assert.deepStrictEqual(fake.replaces, [{ line: 1, text: 'X' }]);
    assert.deepStrictEqual(fake.lines, ['a', 'X', 'c']);
    assert.strictEqual(fake.getEditCalls(), 1);
  });

  test('TC-N-03: converting a document issues one edit per line', async () => {
    const fake = createFakeEditor(['LiNe1', 'LiNe2', 'lINE3', 'LinE4']);

    const result = await bufferToUppercase(new TextEditorLineBuffer(fake.editor));

    assert.deepStrictEqual(fake.lines, ['LINE1', 'LINE2', 'LINE3', 'LINE4']);
    assert.strictEqual(fake.getEditCalls(), 4);
    assert.deepStrictEqual(result, { lineCount: 4, changedLineCount: 4 });
  });

  test('TC-E-01: a rejected edit throws EditRejectedError', async () => {
    const fake = createFakeEditor(['a', 'b'], { rejectEdits: true });
    const buffer = new TextEditorLineBuffer(fake.editor);

    await assert.rejects(
      () => buffer.setLine(1, 'B'),
      (err: unknown) => {
        assert.ok(err instanceof EditRejectedError);
        assert.strictEqual(err.lineIndex, 1);
        assert.strictEqual(err.message, 'The editor rejected the edit for line 1');
        return true;
      },
    );
  });

  test('TC-E-02: an out-of-range index throws RangeError without editing', async () => {
    const fake = createFakeEditor(['a']);
    const buffer = new TextEditorLineBuffer(fake.editor);

    await assert.rejects(() => buffer.setLine(1, 'B'), {
      name: 'RangeError',
      message: 'Line index 1 is out of range (lineCount: 1)',
    });
    await assert.rejects(() => buffer.setLine(-1, 'B'), RangeError);
    assert.strictEqual(fake.getEditCalls(), 0);
  });

  test('TC-N-04: getActiveBuffer is undefined without an active editor', () => {
    const { window } = createFakeWindow(undefined);

    assert.strictEqual(createVscodeEditorHost(window).getActiveBuffer(), undefined);
  });

  test('TC-N-04b: getActiveBuffer wraps the active editor', async () => {
    const fake = createFakeEditor(['x']);
    const { window } = createFakeWindow(fake.editor);

    const buffer = createVscodeEditorHost(window).getActiveBuffer();

    assert.ok(buffer instanceof TextEditorLineBuffer);
    assert.deepStrictEqual(await buffer.getLines(), ['x']);
  });

  test('TC-N-05: messages are forwarded to the window', () => {
    const { window, warnings, errors } = createFakeWindow(undefined);
    const host = createVscodeEditorHost(window);

    host.showWarningMessage('careful');
    host.showErrorMessage('broken');

    assert.deepStrictEqual(warnings, ['careful']);
    assert.deepStrictEqual(errors, ['broken']);
  });
});
