import { createToUppercaseCommand, type ToUppercaseCommandDeps } from './commands/toUppercase';
import type { CommandRegistry, Disposable } from './host/editorHost';

export { toUppercase } from './core/textCase';

export const TO_UPPERCASE_COMMAND_ID = 'uppercase.toUppercase';

/**
 * コマンドをホストへ登録する。返り値の Disposable で登録を解除できる。
 */
export function setup(registry: CommandRegistry, deps: ToUppercaseCommandDeps): Disposable {
  return registry.registerCommand(TO_UPPERCASE_COMMAND_ID, createToUppercaseCommand(deps));
}
