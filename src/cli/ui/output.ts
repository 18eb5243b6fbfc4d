/**
 * Terminal output for the commands, on top of @clack/prompts
 */

import * as p from "@clack/prompts";
import color from "picocolors";
import pkg from "../../../package.json";

export { color };

export const VERSION = pkg.version;
export const APP_NAME = "repovault";

export const ui = {
  /** Title line with name, version and the running command */
  banner(command: string): void {
    p.intro(`${color.cyan(APP_NAME)} ${color.dim(`v${VERSION}`)} ${color.dim("·")} ${color.white(command)}`);
  },
  intro: (title: string) => p.intro(color.bgCyan(color.black(` ${title} `))),
  outro: (message: string) => p.outro(color.green(message)),
  cancel: (message: string) => p.cancel(message),
  note: (message: string, title?: string) => p.note(message, title),

  info: (message: string) => p.log.info(message),
  success: (message: string) => p.log.success(message),
  warn: (message: string) => p.log.warn(message),
  error: (message: string) => p.log.error(message),
  step: (message: string) => p.log.step(message),
  message: (message: string) => p.log.message(message),

  spinner: p.spinner,
  confirm: p.confirm,
  isCancel: p.isCancel,
};
