import * as fs from 'fs';
import * as path from 'path';

/**
 * UI文言の翻訳
 *
 * ホスト（VS Code）では vscode.l10n.t を translator として差し込み、表示言語に応じた文字列を返す。
 * 翻訳が無い場合はデフォルト（英語）バンドルにフォールバックする。
 */
export type PrimitiveArg = string | number | boolean;
export type Translator = (message: string, ...args: PrimitiveArg[]) => string;

/**
 * ホスト外（単体テスト等）で使う既定の translator。翻訳はせず、プレースホルダー置換だけを行う。
 */
const defaultTranslator: Translator = (message, ...args) => formatMessage(message, args);

let translator: Translator = defaultTranslator;
let enFallbackBundle: Record<string, string> | undefined;

/**
 * 翻訳関数を差し替える。activate 時に vscode.l10n.t を渡す。
 */
export function setTranslator(next: Translator): void {
  translator = next;
}

/**
 * テスト用: translator とキャッシュ済みバンドルを初期状態へ戻す。
 */
export function resetL10nForTesting(): void {
  translator = defaultTranslator;
  enFallbackBundle = undefined;
}

export function resolveEnglishBundlePath(): string {
  // src/core と dist/core のどちらから見ても 2階層上が拡張機能ルート
  return path.resolve(__dirname, '..', '..', 'l10n', 'bundle.l10n.json');
}

function loadEnglishFallbackBundle(): Record<string, string> {
  if (enFallbackBundle) {
    return enFallbackBundle;
  }

  // NOTE:
  // - VS Code の l10n 仕様上、デフォルト言語（通常は英語）では bundle がロードされない。
  // - キー文字列を message として渡しているため、英語環境ではキーがそのまま返ってくる。
  // - そのため、英語文言は l10n/bundle.l10n.json を自前で読み込んでフォールバックする。
  const out: Record<string, string> = {};
  try {
    const raw = fs.readFileSync(resolveEnglishBundlePath(), 'utf8');
    const parsed: unknown = JSON.parse(raw);
    if (typeof parsed === 'object' && parsed !== null && !Array.isArray(parsed)) {
      for (const [k, v] of Object.entries(parsed)) {
        if (typeof v === 'string') {
          out[k] = v;
        }
      }
    }
  } catch (error) {
    // バンドルが読めなくても主要機能は継続できる。キーをそのまま表示することになるので警告だけ残す。
    console.warn('[uppercase] 英語フォールバックバンドルの読み込みに失敗しました', error);
  }
  enFallbackBundle = out;
  return out;
}

/**
 * `{0}` 形式のプレースホルダーを位置引数で置換する（vscode.l10n.t と同じ記法）。
 * 対応する引数が無いプレースホルダーはそのまま残す。
 */
export function formatMessage(template: string, args: readonly PrimitiveArg[]): string {
  return template.replace(/\{(\d+)\}/g, (match: string, index: string) => {
    const value = args[Number(index)];
    return value === undefined ? match : String(value);
  });
}

export function t(message: string, ...args: PrimitiveArg[]): string {
  const translated = translator(message, ...args);

  // 翻訳が存在する場合はそれを返す（通常はデフォルト言語以外）
  if (translated !== message) {
    return translated;
  }

  // デフォルト言語（英語）/ 未翻訳キーの場合は、英語バンドルへフォールバック
  const fallback = loadEnglishFallbackBundle()[message];
  if (!fallback) {
    return translated;
  }

  // 引数がある場合は、プレースホルダー置換のために英語文言を translator へ通す
  return args.length === 0 ? fallback : translator(fallback, ...args);
}
