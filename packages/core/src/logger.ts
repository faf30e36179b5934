/**
 * `[parsnip]`-prefixed console output.
 *
 * Progress lines are printed only when `verbose` is configured; warnings are
 * always printed. Both writers can be replaced, which is how tests capture
 * output.
 */

import { config } from "./config.js";

export type LogWriter = (line: string) => void;

const PREFIX = "[parsnip]";

const defaultWriter: LogWriter = (line) => console.log(line);
const defaultWarnWriter: LogWriter = (line) => console.warn(line);

let writer: LogWriter = defaultWriter;
let warnWriter: LogWriter = defaultWarnWriter;

export const logger = {
  /** Print a progress line when `verbose` is on. */
  verbose(message: string): void {
    if (config.get<boolean>("verbose")) {
      writer(`${PREFIX} ${message}`);
    }
  },

  warn(message: string): void {
    warnWriter(`${PREFIX} ${message}`);
  },

  /** Replace the writers; omitted ones go back to the console. */
  setWriters(writers: { log?: LogWriter; warn?: LogWriter } = {}): void {
    writer = writers.log ?? defaultWriter;
    warnWriter = writers.warn ?? defaultWarnWriter;
  },
};
