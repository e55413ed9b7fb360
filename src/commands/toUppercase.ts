import { bufferToUppercase } from '../core/bufferTransform';
import { t } from '../core/l10n';
import type { ILogger } from '../core/logger';
import type { EditorHost } from '../host/editorHost';

export interface ToUppercaseCommandDeps {
  host: EditorHost;
  logger: ILogger;
}

/**
 * アクティブなドキュメントの全行を大文字に変換するコマンドハンドラを作る。
 *
 * 変換中のエラーはここで受け止め、ログ（出力先も表示する）と `showErrorMessage` で利用者へ通知する。
 * 再送出すると VS Code 側でも同じエラーが通知されるため、ここで完結させる。
 */
export function createToUppercaseCommand(deps: ToUppercaseCommandDeps): () => Promise<void> {
  const { host, logger } = deps;

  return async () => {
    const buffer = host.getActiveBuffer();
    if (!buffer) {
      logger.warn('toUppercase: no active editor');
      host.showWarningMessage(t('toUppercase.noActiveEditor'));
      return;
    }

    try {
      const result = await bufferToUppercase(buffer);
      logger.info(`Converted ${result.changedLineCount}/${result.lineCount} lines to uppercase`);
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      logger.error(`toUppercase failed: ${err.message}`, err);
      logger.show();
      host.showErrorMessage(t('toUppercase.failed', err.message));
    }
  };
}
