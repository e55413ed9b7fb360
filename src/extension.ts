import * as vscode from 'vscode';
import { setTranslator } from './core/l10n';
import { Logger } from './core/logger';
import { CONFIG_SECTION, readSettings } from './core/settings';
import { createVscodeEditorHost } from './host/vscodeEditorHost';
import { setup } from './setup';

export { setup, toUppercase, TO_UPPERCASE_COMMAND_ID } from './setup';

/**
 * この関数は拡張機能が有効化されたときに呼ばれます
 */
export function activate(context: vscode.ExtensionContext) {
  const outputChannel = vscode.window.createOutputChannel('Uppercase');
  const logger = new Logger(outputChannel, {
    level: readSettings(vscode.workspace.getConfiguration(CONFIG_SECTION)).logLevel,
  });
  setTranslator((message, ...args) => vscode.l10n.t(message, ...args));

  context.subscriptions.push(
    logger,
    vscode.workspace.onDidChangeConfiguration((event) => {
      if (event.affectsConfiguration(`${CONFIG_SECTION}.logLevel`)) {
        logger.setLevel(readSettings(vscode.workspace.getConfiguration(CONFIG_SECTION)).logLevel);
      }
    }),
    setup(vscode.commands, { host: createVscodeEditorHost(vscode.window), logger }),
  );

  logger.info('拡張機能 "uppercase-lines" が有効化されました');
}

/**
 * この関数は拡張機能が無効化されたときに呼ばれます
 */
export function deactivate() {}
